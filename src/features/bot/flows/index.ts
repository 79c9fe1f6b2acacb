/**
 * Bot flows
 *
 * Commands: /start, /register, /bind <device_id>, /unbind <device_id>, /devices
 * Keywords are matched case-insensitively anywhere in the message, so only
 * the slash forms are registered.
 */

import { addKeyword, type MemoryDB as Database } from '@builderbot/bot'
import type { TelegramProvider } from '@builderbot-plugins/telegram'
import type { SubscriptionCommands } from '../services/SubscriptionCommands'

export function createSubscriptionFlows(commands: SubscriptionCommands) {
    const startFlow = addKeyword<TelegramProvider, Database>(['/start', '/help']).addAction(
        async (_ctx, { flowDynamic }) => {
            await flowDynamic(commands.start())
        }
    )

    const registerFlow = addKeyword<TelegramProvider, Database>('/register').addAction(
        async (ctx, { flowDynamic }) => {
            await flowDynamic(await commands.register(ctx))
        }
    )

    const bindFlow = addKeyword<TelegramProvider, Database>('/bind').addAction(async (ctx, { flowDynamic }) => {
        await flowDynamic(await commands.bind(ctx))
    })

    const unbindFlow = addKeyword<TelegramProvider, Database>('/unbind').addAction(async (ctx, { flowDynamic }) => {
        await flowDynamic(await commands.unbind(ctx))
    })

    const devicesFlow = addKeyword<TelegramProvider, Database>('/devices').addAction(async (ctx, { flowDynamic }) => {
        await flowDynamic(await commands.devices(ctx))
    })

    return [startFlow, registerFlow, bindFlow, unbindFlow, devicesFlow]
}
