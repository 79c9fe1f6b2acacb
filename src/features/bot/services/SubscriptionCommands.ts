/**
 * Subscription Commands
 *
 * Reply texts for the bot commands. The registry is only reached through
 * RegistryApi, so a registry outage turns into a polite reply instead of a
 * crashed flow.
 */

import type { RegistryApi } from '~/features/registry/client/RegistryClient'
import { RegistryClientError } from '~/features/registry/client/RegistryClient'
import { createFlowLogger } from '~/core/utils/logger'
import { extractTelegramProfile, getChatId, getCommandArgument, type ChatMessage } from '../utils/telegramProfile'

const logger = createFlowLogger('subscription-commands')

export const MESSAGES = {
    welcome: [
        '👋 Hi! I deliver snapshots from the cameras you follow.',
        '',
        '/register - sign up to receive photos',
        '/bind <device_id> - follow a camera',
        '/unbind <device_id> - stop following a camera',
        '/devices - list the cameras you follow',
    ].join('\n'),
    registered: '✅ Registration complete! Use /bind <device_id> to follow a camera.',
    bindUsage: 'Usage: /bind <device_id>',
    unbindUsage: 'Usage: /unbind <device_id>',
    notRegistered: '⚠️ You are not registered yet. Send /register first.',
    invalidDevice: '⚠️ That device id is not valid.',
    invalidChat: '⚠️ This chat cannot be registered.',
    noDevices: 'You are not following any cameras yet. Use /bind <device_id>.',
    unavailable: '❌ The camera registry is unavailable right now. Please try again later.',
} as const

export const bound = (deviceId: string) => `📷 You now follow ${deviceId}. Its photos will arrive here.`
export const unbound = (deviceId: string) => `🔕 You no longer follow ${deviceId}.`

export class SubscriptionCommands {
    constructor(private readonly registry: RegistryApi) {}

    start(): string {
        return MESSAGES.welcome
    }

    async register(message: ChatMessage): Promise<string> {
        const chatId = getChatId(message)
        if (chatId === null) {
            return MESSAGES.invalidChat
        }

        try {
            await this.registry.registerUser({ chat_id: chatId, ...extractTelegramProfile(message) })
            logger.info({ chatId }, 'User registered via bot')
            return MESSAGES.registered
        } catch (error) {
            return this.failure(error, 'register', chatId)
        }
    }

    async bind(message: ChatMessage): Promise<string> {
        const chatId = getChatId(message)
        const deviceId = getCommandArgument(message.body)
        if (!deviceId) {
            return MESSAGES.bindUsage
        }
        if (chatId === null) {
            return MESSAGES.invalidChat
        }

        try {
            await this.registry.bind(chatId, deviceId)
            logger.info({ chatId, deviceId }, 'Device bound via bot')
            return bound(deviceId)
        } catch (error) {
            if (error instanceof RegistryClientError && error.status === 409) {
                return MESSAGES.notRegistered
            }
            return this.failure(error, 'bind', chatId)
        }
    }

    async unbind(message: ChatMessage): Promise<string> {
        const chatId = getChatId(message)
        const deviceId = getCommandArgument(message.body)
        if (!deviceId) {
            return MESSAGES.unbindUsage
        }
        if (chatId === null) {
            return MESSAGES.invalidChat
        }

        try {
            await this.registry.unbind(chatId, deviceId)
            logger.info({ chatId, deviceId }, 'Device unbound via bot')
            return unbound(deviceId)
        } catch (error) {
            return this.failure(error, 'unbind', chatId)
        }
    }

    async devices(message: ChatMessage): Promise<string> {
        const chatId = getChatId(message)
        if (chatId === null) {
            return MESSAGES.invalidChat
        }

        try {
            const devices = await this.registry.listUserDevices(chatId)
            if (devices.length === 0) {
                return MESSAGES.noDevices
            }

            const lines = devices.map((device) =>
                device.nickname ? `• ${device.nickname} (${device.device_id})` : `• ${device.device_id}`
            )
            return ['📋 Cameras you follow:', ...lines].join('\n')
        } catch (error) {
            return this.failure(error, 'devices', chatId)
        }
    }

    private failure(error: unknown, command: string, chatId: number | null): string {
        if (error instanceof RegistryClientError && error.code === 'VALIDATION_ERROR') {
            return MESSAGES.invalidDevice
        }
        logger.error({ err: error, command, chatId }, 'Registry call failed')
        return MESSAGES.unavailable
    }
}
