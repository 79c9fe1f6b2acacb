/**
 * Telegram bot entrypoint
 *
 * Lets chat users register and follow cameras. All state lives in the
 * registry service; the bot keeps only BuilderBot's in-memory flow state.
 */

import 'dotenv/config'
import { createBot, createProvider, createFlow, MemoryDB as Database } from '@builderbot/bot'
import { TelegramProvider } from '@builderbot-plugins/telegram'
import { botEnvSchema, loadEnv } from '~/config/env'
import { RegistryClient } from '~/features/registry/client/RegistryClient'
import { SubscriptionCommands } from '~/features/bot/services/SubscriptionCommands'
import { createSubscriptionFlows } from '~/features/bot/flows'
import { loggers } from '~/core/utils/logger'

async function main() {
    const config = loadEnv(botEnvSchema)
    loggers.bot.info({ registryUrl: config.REGISTRY_URL }, 'Starting camera bot')

    const registry = new RegistryClient({ baseUrl: config.REGISTRY_URL, timeoutMs: config.REGISTRY_TIMEOUT_MS })
    const commands = new SubscriptionCommands(registry)

    const adapterFlow = createFlow(createSubscriptionFlows(commands))

    const adapterProvider = createProvider(TelegramProvider, {
        token: config.TELEGRAM_BOT_TOKEN,
    })

    const adapterDB = new Database()

    const { httpServer } = await createBot({
        flow: adapterFlow,
        provider: adapterProvider,
        database: adapterDB,
    })

    httpServer(config.BOT_PORT)

    loggers.bot.info({ port: config.BOT_PORT }, 'Camera bot is running')
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        loggers.bot.info(`Received ${signal} signal, shutting down...`)
        process.exit(0)
    })
}

main().catch((error: unknown) => {
    loggers.bot.fatal({ err: error }, 'Fatal error during startup')
    process.exit(1)
})
