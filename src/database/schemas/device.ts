/**
 * Device Schema
 * A camera watcher, keyed by an opaque device identifier
 */

export interface Device {
    device_id: string
    nickname: string | null
    registered_at: Date
}

export interface DeviceSummary {
    device_id: string
    nickname: string | null
}

/**
 * A null nickname keeps whatever nickname is already stored
 */
export interface DeviceRegistration {
    device_id: string
    nickname: string | null
}
