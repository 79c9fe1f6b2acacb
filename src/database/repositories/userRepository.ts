import type { Queryable } from '../types'
import type { UserRegistration } from '../schemas/registeredUser'

export class UserRepository {
    constructor(private readonly db: Queryable) {}

    /**
     * Insert a user or overwrite every profile field (last write wins)
     * registered_at is only set on insert
     */
    async upsert(user: UserRegistration): Promise<void> {
        await this.db.query(
            `INSERT INTO registered_users (chat_id, username, first_name, last_name)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (chat_id)
             DO UPDATE SET username = EXCLUDED.username,
                           first_name = EXCLUDED.first_name,
                           last_name = EXCLUDED.last_name`,
            [user.chat_id, user.username, user.first_name, user.last_name]
        )
    }
}
