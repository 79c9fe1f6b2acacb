import { Router, type Request } from 'express'
import { asyncHandler } from '~/core/utils/asyncHandler'
import type { RegistryService } from '../services/RegistryService'
import {
    bindingSchema,
    chatIdSchema,
    deviceIdSchema,
    parseInput,
    registerDeviceSchema,
    registerUserSchema,
} from '../validators'

const OK = { status: 'ok' } as const

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * bind/unbind take chat_id and device_id from the query string or a form
 * body; query parameters win when both are present
 */
function bindingParams(req: Request): Record<string, unknown> {
    const form: unknown = req.body
    return { ...(isRecord(form) ? form : {}), ...req.query }
}

export function createRegistryRouter(service: RegistryService): Router {
    const router = Router()

    router.post(
        '/register',
        asyncHandler(async (req, res) => {
            const user = parseInput(registerUserSchema, req.body)
            await service.registerUser(user)
            res.status(201).json(OK)
        })
    )

    router.post(
        '/devices',
        asyncHandler(async (req, res) => {
            const device = parseInput(registerDeviceSchema, req.body)
            await service.registerDevice(device)
            res.status(201).json(OK)
        })
    )

    router.get(
        '/devices/:device_id',
        asyncHandler(async (req, res) => {
            const { device_id } = parseInput(registerDeviceSchema.pick({ device_id: true }), req.params)
            const device = await service.getDevice(device_id)
            res.status(200).json(device)
        })
    )

    router.post(
        '/bind',
        asyncHandler(async (req, res) => {
            const binding = parseInput(bindingSchema, bindingParams(req))
            await service.bind(binding)
            res.status(201).json(OK)
        })
    )

    router.delete(
        '/bind',
        asyncHandler(async (req, res) => {
            const binding = parseInput(bindingSchema, bindingParams(req))
            await service.unbind(binding)
            res.status(200).json(OK)
        })
    )

    router.get(
        '/subscribers/:device_id',
        asyncHandler(async (req, res) => {
            const deviceId = parseInput(deviceIdSchema, req.params.device_id)
            const subscribers = await service.listSubscribers(deviceId)
            res.status(200).json(subscribers)
        })
    )

    router.get(
        '/users/:chat_id/devices',
        asyncHandler(async (req, res) => {
            const chatId = parseInput(chatIdSchema, req.params.chat_id)
            const devices = await service.listDevicesForChat(chatId)
            res.status(200).json(devices)
        })
    )

    router.get('/health', (_req, res) => {
        res.status(200).json(service.health())
    })

    return router
}
