/**
 * RegistryService Unit Tests
 * Registration, binding and lookup semantics over the in-memory store
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { RegistryService } from '~/features/registry/services/RegistryService'
import { NotFoundError, ReferentialIntegrityError, StorageUnavailableError } from '~/core/errors/RegistryError'
import { InMemoryRegistryStore } from '../../utils/InMemoryRegistryStore'

const profile = (chatId: number, username: string | null = null) => ({
    chat_id: chatId,
    username,
    first_name: null,
    last_name: null,
})

describe('RegistryService', () => {
    let store: InMemoryRegistryStore
    let service: RegistryService

    beforeEach(() => {
        store = new InMemoryRegistryStore()
        service = new RegistryService(store)
    })

    describe('registerUser', () => {
        it('should overwrite every profile field on re-registration', async () => {
            await service.registerUser({ chat_id: 100, username: 'alice', first_name: 'Alice', last_name: 'Smith' })
            const firstRegisteredAt = store.users.get(100)?.registered_at

            await service.registerUser({ chat_id: 100, username: 'alice2', first_name: null, last_name: null })

            expect(store.users.get(100)).toEqual({
                chat_id: 100,
                username: 'alice2',
                first_name: null,
                last_name: null,
                registered_at: firstRegisteredAt,
            })
        })
    })

    describe('registerDevice', () => {
        it('should keep the stored nickname when none is supplied', async () => {
            await service.registerDevice({ device_id: 'cam1', nickname: 'kitchen' })
            await service.registerDevice({ device_id: 'cam1', nickname: null })

            expect(store.devices.get('cam1')?.nickname).toBe('kitchen')
        })

        it('should replace the nickname when a new one is supplied', async () => {
            await service.registerDevice({ device_id: 'cam1', nickname: 'kitchen' })
            await service.registerDevice({ device_id: 'cam1', nickname: 'garage' })

            expect(store.devices.get('cam1')?.nickname).toBe('garage')
        })
    })

    describe('bind', () => {
        it('should create the device on first bind and list the subscriber', async () => {
            await service.registerUser(profile(100, 'alice'))
            await service.bind({ chat_id: 100, device_id: 'cam1' })

            expect(await service.listSubscribers('cam1')).toEqual([100])
            expect(store.devices.get('cam1')?.nickname).toBeNull()
        })

        it('should be idempotent', async () => {
            await service.registerUser(profile(100))
            await service.bind({ chat_id: 100, device_id: 'cam1' })
            await service.bind({ chat_id: 100, device_id: 'cam1' })

            expect(await service.listSubscribers('cam1')).toEqual([100])
        })

        it('should reject an unregistered chat and leave no device behind', async () => {
            await expect(service.bind({ chat_id: 200, device_id: 'cam-new' })).rejects.toBeInstanceOf(
                ReferentialIntegrityError
            )

            await expect(service.getDevice('cam-new')).rejects.toBeInstanceOf(NotFoundError)
            expect(await service.listSubscribers('cam-new')).toEqual([])
        })
    })

    describe('unbind', () => {
        it('should remove the subscription and keep the device', async () => {
            await service.registerUser(profile(100))
            await service.bind({ chat_id: 100, device_id: 'cam1' })

            await service.unbind({ chat_id: 100, device_id: 'cam1' })

            expect(await service.listSubscribers('cam1')).toEqual([])
            expect((await service.getDevice('cam1')).device_id).toBe('cam1')
        })

        it('should succeed when nothing is bound', async () => {
            await expect(service.unbind({ chat_id: 999, device_id: 'nope' })).resolves.toBeUndefined()
        })
    })

    describe('lookups', () => {
        it('should return an empty list for an unknown device', async () => {
            expect(await service.listSubscribers('unknown')).toEqual([])
        })

        it('should list the devices a chat follows', async () => {
            await service.registerUser(profile(100))
            await service.registerDevice({ device_id: 'cam2', nickname: 'porch' })
            await service.bind({ chat_id: 100, device_id: 'cam2' })
            await service.bind({ chat_id: 100, device_id: 'cam1' })

            expect(await service.listDevicesForChat(100)).toEqual([
                { device_id: 'cam1', nickname: null },
                { device_id: 'cam2', nickname: 'porch' },
            ])
        })

        it('should throw NotFoundError for a device that was never persisted', async () => {
            await expect(service.getDevice('ghost')).rejects.toThrow('Device ghost not found')
        })
    })

    describe('health', () => {
        it('should report up without touching storage', () => {
            store.unavailable = true

            expect(service.health()).toEqual({ status: 'up' })
            expect(store.calls).toBe(0)
        })
    })

    it('should propagate storage outages', async () => {
        store.unavailable = true

        await expect(service.listSubscribers('cam1')).rejects.toBeInstanceOf(StorageUnavailableError)
    })
})
