/**
 * Registry HTTP client
 *
 * Used by the bot and the watchers. Non-2xx responses become
 * RegistryClientError carrying the HTTP status and the registry's error code.
 */

import { fetch as undiciFetch, type RequestInit } from 'undici'
import { z } from 'zod'
import { ServiceError } from '~/core/errors/ServiceError'
import type { DeviceSummary } from '~/database/schemas/device'
import { createFlowLogger } from '~/core/utils/logger'

const logger = createFlowLogger('registry-client')

export class RegistryClientError extends ServiceError {
    constructor(
        message: string,
        code: string,
        public readonly status?: number,
        cause?: unknown
    ) {
        // Timeouts, connection failures and 5xx are worth retrying
        super('RegistryClient', message, code, cause, status === undefined || status >= 500)
    }
}

export interface HttpResponseLike {
    ok: boolean
    status: number
    json(): Promise<unknown>
}

export type FetchFn = (url: string, init: RequestInit) => Promise<HttpResponseLike>

export interface RegistryClientOptions {
    baseUrl: string
    timeoutMs?: number
    fetch?: FetchFn
}

export interface UserProfile {
    chat_id: number
    username?: string | null
    first_name?: string | null
    last_name?: string | null
}

/**
 * The registry operations the bot and watchers depend on
 */
export interface RegistryApi {
    registerUser(profile: UserProfile): Promise<void>
    registerDevice(deviceId: string, nickname?: string | null): Promise<void>
    bind(chatId: number, deviceId: string): Promise<void>
    unbind(chatId: number, deviceId: string): Promise<void>
    listSubscribers(deviceId: string): Promise<number[]>
    listUserDevices(chatId: number): Promise<DeviceSummary[]>
}

const errorBodySchema = z.object({ error: z.string(), code: z.string() })
const subscribersSchema = z.array(z.number().int())
const deviceSummariesSchema = z.array(z.object({ device_id: z.string(), nickname: z.string().nullable() }))

export class RegistryClient implements RegistryApi {
    private readonly baseUrl: string
    private readonly timeoutMs: number
    private readonly fetch: FetchFn

    constructor(options: RegistryClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '')
        this.timeoutMs = options.timeoutMs ?? 10000
        this.fetch = options.fetch ?? undiciFetch
    }

    async registerUser(profile: UserProfile): Promise<void> {
        await this.request('POST', '/register', { json: profile })
    }

    async registerDevice(deviceId: string, nickname?: string | null): Promise<void> {
        await this.request('POST', '/devices', { json: { device_id: deviceId, nickname: nickname ?? null } })
    }

    async bind(chatId: number, deviceId: string): Promise<void> {
        await this.request('POST', `/bind?${bindingQuery(chatId, deviceId)}`)
    }

    async unbind(chatId: number, deviceId: string): Promise<void> {
        await this.request('DELETE', `/bind?${bindingQuery(chatId, deviceId)}`)
    }

    async listSubscribers(deviceId: string): Promise<number[]> {
        const body = await this.request('GET', `/subscribers/${encodeURIComponent(deviceId)}`)
        return this.parseBody(subscribersSchema, body, 'subscribers')
    }

    async listUserDevices(chatId: number): Promise<DeviceSummary[]> {
        const body = await this.request('GET', `/users/${chatId}/devices`)
        return this.parseBody(deviceSummariesSchema, body, 'user devices')
    }

    private async request(method: string, path: string, options: { json?: unknown } = {}): Promise<unknown> {
        const hasBody = options.json !== undefined
        const init: RequestInit = {
            method,
            headers: hasBody
                ? { accept: 'application/json', 'content-type': 'application/json' }
                : { accept: 'application/json' },
            body: hasBody ? JSON.stringify(options.json) : undefined,
            signal: AbortSignal.timeout(this.timeoutMs),
        }

        let response: HttpResponseLike
        try {
            response = await this.fetch(`${this.baseUrl}${path}`, init)
        } catch (error) {
            logger.warn({ err: error, method, path }, 'Registry unreachable')
            throw new RegistryClientError(`Registry unreachable: ${method} ${path}`, 'REGISTRY_UNREACHABLE', undefined, error)
        }

        const body = await response.json().catch(() => null)

        if (!response.ok) {
            const parsed = errorBodySchema.safeParse(body)
            const message = parsed.success ? parsed.data.error : `Registry responded with ${response.status}`
            const code = parsed.success ? parsed.data.code : 'REGISTRY_ERROR'
            logger.warn({ method, path, status: response.status, code }, 'Registry request failed')
            throw new RegistryClientError(message, code, response.status)
        }

        return body
    }

    private parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
        const parsed = schema.safeParse(body)
        if (!parsed.success) {
            throw new RegistryClientError(`Unexpected ${what} payload from registry`, 'INVALID_RESPONSE', 200, parsed.error)
        }
        return parsed.data
    }
}

function bindingQuery(chatId: number, deviceId: string): string {
    return new URLSearchParams({ chat_id: String(chatId), device_id: deviceId }).toString()
}
