import { z } from 'zod'
import { ValidationError } from '~/core/errors/RegistryError'

/**
 * Chat ids arrive as JSON numbers or as query/form strings.
 * Negative ids are group chats.
 */
export const chatIdSchema = z
    .union([z.number(), z.string().trim().regex(/^-?\d+$/, 'Expected an integer')])
    .pipe(z.coerce.number().int('Expected an integer').refine(Number.isSafeInteger, 'Integer out of range'))

// PostgreSQL TEXT cannot hold NUL
const withoutNul = (value: string) => !value.includes('\u0000')
const NUL_MESSAGE = 'Must not contain NUL characters'

const text = () => z.string().refine(withoutNul, NUL_MESSAGE)

/**
 * Device ids are opaque: stored exactly as sent, only empty ones are rejected
 */
export const deviceIdSchema = z
    .string({ required_error: 'Required' })
    .min(1, 'Must not be empty')
    .refine(withoutNul, NUL_MESSAGE)

// Absent and null both mean "no value"
const profileField = text()
    .nullish()
    .transform((value) => value ?? null)

// Blank nicknames count as absent so they never overwrite a stored one
const nicknameField = text()
    .nullish()
    .transform((value) => (value && value.trim() ? value : null))

export const registerUserSchema = z.object({
    chat_id: chatIdSchema,
    username: profileField,
    first_name: profileField,
    last_name: profileField,
})

export const registerDeviceSchema = z.object({
    device_id: deviceIdSchema,
    nickname: nicknameField,
})

export const bindingSchema = z.object({
    chat_id: chatIdSchema,
    device_id: deviceIdSchema,
})

export type RegisterUserInput = z.infer<typeof registerUserSchema>
export type RegisterDeviceInput = z.infer<typeof registerDeviceSchema>
export type BindingInput = z.infer<typeof bindingSchema>

/**
 * Parse untrusted input or throw a ValidationError carrying per-field messages
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const parsed = schema.safeParse(input)

    if (!parsed.success) {
        const flattened = parsed.error.flatten()
        const details: Record<string, string[]> = {}
        for (const [field, messages] of Object.entries(flattened.fieldErrors)) {
            if (messages && messages.length > 0) {
                details[field] = messages
            }
        }
        if (flattened.formErrors.length > 0) {
            details._ = flattened.formErrors
        }
        throw new ValidationError('Invalid request', details)
    }

    return parsed.data
}
