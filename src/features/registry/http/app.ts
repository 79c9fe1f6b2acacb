import express, { type Express } from 'express'
import type { RegistryService } from '../services/RegistryService'
import { createRegistryRouter } from './registryRoutes'
import { errorHandler, notFoundHandler, requestLogger } from './middleware'

/**
 * Build the registry HTTP application around an injected service
 */
export function createRegistryApp(service: RegistryService): Express {
    const app = express()
    app.disable('x-powered-by')

    app.use(requestLogger())
    app.use(express.json())
    app.use(express.urlencoded({ extended: false }))

    app.use(createRegistryRouter(service))

    app.use(notFoundHandler())
    app.use(errorHandler())

    return app
}
