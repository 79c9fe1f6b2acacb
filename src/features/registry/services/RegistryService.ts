/**
 * Registry Service
 *
 * Single source of truth for who follows which camera. Operations are
 * idempotent so bots and watchers can retry them after a network failure:
 * - user registration overwrites the profile (last write wins)
 * - device registration merges the nickname (null keeps the stored one)
 * - bind/unbind converge on the same state whatever the number of calls
 */

import type { RegistryStore } from '../stores/RegistryStore'
import type { Device, DeviceSummary } from '~/database/schemas/device'
import type { BindingInput, RegisterDeviceInput, RegisterUserInput } from '../validators'
import { NotFoundError } from '~/core/errors/RegistryError'
import { loggers } from '~/core/utils/logger'

const logger = loggers.registry

export interface HealthStatus {
    status: 'up'
}

export class RegistryService {
    constructor(private readonly store: RegistryStore) {}

    async registerUser(user: RegisterUserInput): Promise<void> {
        await this.store.upsertUser(user)
        logger.info({ chatId: user.chat_id }, 'User registered')
    }

    async registerDevice(device: RegisterDeviceInput): Promise<void> {
        await this.store.upsertDevice(device)
        logger.info({ deviceId: device.device_id, nickname: device.nickname }, 'Device registered')
    }

    async bind({ chat_id, device_id }: BindingInput): Promise<void> {
        await this.store.bind(chat_id, device_id)
        logger.info({ chatId: chat_id, deviceId: device_id }, 'Subscription bound')
    }

    async unbind({ chat_id, device_id }: BindingInput): Promise<void> {
        const removed = await this.store.unbind(chat_id, device_id)
        logger.info({ chatId: chat_id, deviceId: device_id, removed }, 'Subscription unbound')
    }

    async listSubscribers(deviceId: string): Promise<number[]> {
        return this.store.listSubscribers(deviceId)
    }

    /**
     * @throws NotFoundError when the device was never persisted
     */
    async getDevice(deviceId: string): Promise<Device> {
        const device = await this.store.findDevice(deviceId)
        if (!device) {
            throw new NotFoundError(`Device ${deviceId} not found`)
        }
        return device
    }

    async listDevicesForChat(chatId: number): Promise<DeviceSummary[]> {
        return this.store.listDevicesForChat(chatId)
    }

    health(): HealthStatus {
        return { status: 'up' }
    }
}
