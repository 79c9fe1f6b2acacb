/**
 * RegistryApi double for bot and watcher tests
 */

import { vi } from 'vitest'
import type { RegistryApi, UserProfile } from '~/features/registry/client/RegistryClient'
import type { DeviceSummary } from '~/database/schemas/device'

export function createMockRegistryApi() {
    return {
        registerUser: vi.fn(async (_profile: UserProfile): Promise<void> => {}),
        registerDevice: vi.fn(async (_deviceId: string, _nickname?: string | null): Promise<void> => {}),
        bind: vi.fn(async (_chatId: number, _deviceId: string): Promise<void> => {}),
        unbind: vi.fn(async (_chatId: number, _deviceId: string): Promise<void> => {}),
        listSubscribers: vi.fn(async (_deviceId: string): Promise<number[]> => []),
        listUserDevices: vi.fn(async (_chatId: number): Promise<DeviceSummary[]> => []),
    } satisfies RegistryApi
}

export type MockRegistryApi = ReturnType<typeof createMockRegistryApi>
