import type { ConnectionSource, Queryable } from '~/database/types'
import { withClient, withTransaction } from '~/database/transaction'
import { translateStorageError } from '~/database/pgErrors'
import { UserRepository } from '~/database/repositories/userRepository'
import { DeviceRepository } from '~/database/repositories/deviceRepository'
import { SubscriptionRepository } from '~/database/repositories/subscriptionRepository'
import { ReferentialIntegrityError } from '~/core/errors/RegistryError'
import type { Device, DeviceRegistration, DeviceSummary } from '~/database/schemas/device'
import type { UserRegistration } from '~/database/schemas/registeredUser'
import type { RegistryStore } from './RegistryStore'

/**
 * RegistryStore backed by PostgreSQL
 *
 * Each call checks out one pooled client for its duration. bind is the only
 * multi-statement operation and runs in a READ COMMITTED transaction; the
 * ON CONFLICT clauses make concurrent binds to a new device converge.
 */
export class PostgresRegistryStore implements RegistryStore {
    constructor(private readonly pool: ConnectionSource) {}

    async upsertUser(user: UserRegistration): Promise<void> {
        await this.run('register_user', (db) => new UserRepository(db).upsert(user))
    }

    async upsertDevice(device: DeviceRegistration): Promise<void> {
        await this.run('register_device', (db) => new DeviceRepository(db).upsert(device))
    }

    async bind(chatId: number, deviceId: string): Promise<void> {
        try {
            await withTransaction(this.pool, async (client) => {
                await new DeviceRepository(client).ensureExists(deviceId)
                await new SubscriptionRepository(client).create(chatId, deviceId)
            })
        } catch (error) {
            const translated = translateStorageError(error, 'bind')
            if (translated instanceof ReferentialIntegrityError) {
                throw new ReferentialIntegrityError(`chat_id ${chatId} is not registered`, error)
            }
            throw translated
        }
    }

    async unbind(chatId: number, deviceId: string): Promise<boolean> {
        return this.run('unbind', (db) => new SubscriptionRepository(db).delete(chatId, deviceId))
    }

    async listSubscribers(deviceId: string): Promise<number[]> {
        return this.run('list_subscribers', (db) => new SubscriptionRepository(db).listChatIds(deviceId))
    }

    async findDevice(deviceId: string): Promise<Device | null> {
        return this.run('get_device', (db) => new DeviceRepository(db).findById(deviceId))
    }

    async listDevicesForChat(chatId: number): Promise<DeviceSummary[]> {
        return this.run('list_user_devices', (db) => new DeviceRepository(db).listForChat(chatId))
    }

    private async run<T>(operation: string, work: (db: Queryable) => Promise<T>): Promise<T> {
        try {
            return await withClient(this.pool, work)
        } catch (error) {
            throw translateStorageError(error, operation)
        }
    }
}
