/**
 * Registered User Schema
 * A chat that registered with the bot, keyed by its numeric Telegram chat id
 *
 * chat_id is BIGINT in storage; ids are limited to safe integers (2^53).
 */

export interface RegisteredUser {
    chat_id: number
    username: string | null
    first_name: string | null
    last_name: string | null
    registered_at: Date
}

/**
 * Profile fields are written as given: null clears a stored value
 */
export interface UserRegistration {
    chat_id: number
    username: string | null
    first_name: string | null
    last_name: string | null
}
