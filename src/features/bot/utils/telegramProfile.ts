import { z } from 'zod'

/**
 * The parts of an incoming BuilderBot context the bot commands read
 */
export interface ChatMessage {
    from: string
    body: string
    name?: string
    messageCtx?: unknown
}

export interface TelegramProfile {
    username: string | null
    first_name: string | null
    last_name: string | null
}

// Telegraf context attached by the Telegram provider
const messageCtxSchema = z.object({
    update: z.object({
        message: z.object({
            from: z.object({
                username: z.string().optional(),
                first_name: z.string().optional(),
                last_name: z.string().optional(),
            }),
        }),
    }),
})

/**
 * Numeric chat id of the sender, or null when ctx.from is not one
 */
export function getChatId(message: ChatMessage): number | null {
    const trimmed = message.from.trim()
    if (!/^-?\d+$/.test(trimmed)) {
        return null
    }
    const chatId = Number(trimmed)
    return Number.isSafeInteger(chatId) ? chatId : null
}

/**
 * Profile fields from the raw Telegram update, falling back to ctx.name
 * for the first name when the update is not available
 */
export function extractTelegramProfile(message: ChatMessage): TelegramProfile {
    const parsed = messageCtxSchema.safeParse(message.messageCtx)

    if (parsed.success) {
        const { username, first_name, last_name } = parsed.data.update.message.from
        return {
            username: username ?? null,
            first_name: first_name ?? null,
            last_name: last_name ?? null,
        }
    }

    return {
        username: null,
        first_name: message.name ? message.name : null,
        last_name: null,
    }
}

/**
 * Text after the command word, e.g. "/bind@camera_bot cam1" -> "cam1"
 */
export function getCommandArgument(body: string): string {
    const [, ...rest] = body.trim().split(/\s+/)
    return rest.join(' ')
}
