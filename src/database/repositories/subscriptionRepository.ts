import type { Queryable } from '../types'

export class SubscriptionRepository {
    constructor(private readonly db: Queryable) {}

    /**
     * Create the binding; an existing binding is left untouched
     */
    async create(chatId: number, deviceId: string): Promise<void> {
        await this.db.query(
            `INSERT INTO user_devices (chat_id, device_id)
             VALUES ($1, $2)
             ON CONFLICT (chat_id, device_id) DO NOTHING`,
            [chatId, deviceId]
        )
    }

    /**
     * @returns whether a binding was actually removed
     */
    async delete(chatId: number, deviceId: string): Promise<boolean> {
        const result = await this.db.query('DELETE FROM user_devices WHERE chat_id = $1 AND device_id = $2', [
            chatId,
            deviceId,
        ])
        return result.rowCount ? result.rowCount > 0 : false
    }

    async listChatIds(deviceId: string): Promise<number[]> {
        const result = await this.db.query<{ chat_id: string }>(
            'SELECT chat_id FROM user_devices WHERE device_id = $1',
            [deviceId]
        )
        return result.rows.map((row) => Number(row.chat_id))
    }
}
