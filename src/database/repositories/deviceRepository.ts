import type { Queryable } from '../types'
import type { Device, DeviceRegistration, DeviceSummary } from '../schemas/device'

export class DeviceRepository {
    constructor(private readonly db: Queryable) {}

    /**
     * Insert a device or merge its nickname
     * A null nickname never overwrites the stored one
     */
    async upsert(device: DeviceRegistration): Promise<void> {
        await this.db.query(
            `INSERT INTO devices (device_id, nickname)
             VALUES ($1, $2)
             ON CONFLICT (device_id)
             DO UPDATE SET nickname = COALESCE(EXCLUDED.nickname, devices.nickname)`,
            [device.device_id, device.nickname]
        )
    }

    /**
     * Create a nickname-less device unless one already exists
     */
    async ensureExists(deviceId: string): Promise<void> {
        await this.db.query('INSERT INTO devices (device_id) VALUES ($1) ON CONFLICT (device_id) DO NOTHING', [
            deviceId,
        ])
    }

    async findById(deviceId: string): Promise<Device | null> {
        const result = await this.db.query<Device>(
            'SELECT device_id, nickname, registered_at FROM devices WHERE device_id = $1',
            [deviceId]
        )
        return result.rows.length > 0 ? result.rows[0] : null
    }

    /**
     * Devices a chat is subscribed to, ordered by device id
     */
    async listForChat(chatId: number): Promise<DeviceSummary[]> {
        const result = await this.db.query<DeviceSummary>(
            `SELECT d.device_id, d.nickname
             FROM user_devices ud
             JOIN devices d ON d.device_id = ud.device_id
             WHERE ud.chat_id = $1
             ORDER BY d.device_id`,
            [chatId]
        )
        return result.rows
    }
}
