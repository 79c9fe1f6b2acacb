import { Telegram } from 'telegraf'

export interface PhotoSender {
    sendPhoto(chatId: number, photoPath: string, caption: string): Promise<void>
}

/**
 * Sends photos through the Telegram Bot API without starting a bot
 */
export class TelegramPhotoSender implements PhotoSender {
    private readonly telegram: Telegram

    constructor(token: string) {
        this.telegram = new Telegram(token)
    }

    async sendPhoto(chatId: number, photoPath: string, caption: string): Promise<void> {
        await this.telegram.sendPhoto(chatId, { source: photoPath }, { caption })
    }
}
