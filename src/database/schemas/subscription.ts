/**
 * Subscription Schema
 * Binding between one chat and one device; the pair is the primary key
 */

export interface Subscription {
    chat_id: number
    device_id: string
}
