import type { Device, DeviceRegistration, DeviceSummary } from '~/database/schemas/device'
import type { UserRegistration } from '~/database/schemas/registeredUser'

/**
 * Persistence seam of the registry
 *
 * Every method is safe to retry. Implementations raise only RegistryError
 * subclasses.
 */
export interface RegistryStore {
    upsertUser(user: UserRegistration): Promise<void>
    upsertDevice(device: DeviceRegistration): Promise<void>

    /**
     * Ensure the device and the binding exist, atomically
     * @throws ReferentialIntegrityError when the chat is not registered
     */
    bind(chatId: number, deviceId: string): Promise<void>

    /**
     * @returns whether a binding was removed
     */
    unbind(chatId: number, deviceId: string): Promise<boolean>

    listSubscribers(deviceId: string): Promise<number[]>
    findDevice(deviceId: string): Promise<Device | null>
    listDevicesForChat(chatId: number): Promise<DeviceSummary[]>
}
