/**
 * RegistryClient Unit Tests
 * Request shapes and error mapping against an injected fetch
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'
import { RegistryClient, RegistryClientError, type FetchFn, type HttpResponseLike } from '~/features/registry/client/RegistryClient'

function response(status: number, body: unknown): HttpResponseLike {
    return {
        ok: status >= 200 && status < 300,
        status,
        json: async () => body,
    }
}

describe('RegistryClient', () => {
    let fetch: Mock<FetchFn>
    let client: RegistryClient

    beforeEach(() => {
        fetch = vi.fn<FetchFn>()
        client = new RegistryClient({ baseUrl: 'http://registry.test/', fetch })
    })

    it('should post user registrations as JSON', async () => {
        fetch.mockResolvedValueOnce(response(201, { status: 'ok' }))

        await client.registerUser({ chat_id: 100, username: 'alice' })

        const [url, init] = fetch.mock.calls[0]
        expect(url).toBe('http://registry.test/register')
        expect(init.method).toBe('POST')
        expect(init.body).toBe('{"chat_id":100,"username":"alice"}')
    })

    it('should send a null nickname when none is configured', async () => {
        fetch.mockResolvedValueOnce(response(201, { status: 'ok' }))

        await client.registerDevice('cam1')

        const [url, init] = fetch.mock.calls[0]
        expect(url).toBe('http://registry.test/devices')
        expect(init.body).toBe('{"device_id":"cam1","nickname":null}')
    })

    it('should pass bind parameters in the query string', async () => {
        fetch.mockResolvedValue(response(201, { status: 'ok' }))

        await client.bind(100, 'front door')
        await client.unbind(100, 'front door')

        expect(fetch.mock.calls[0][0]).toBe('http://registry.test/bind?chat_id=100&device_id=front+door')
        expect(fetch.mock.calls[0][1].method).toBe('POST')
        expect(fetch.mock.calls[0][1].body).toBeUndefined()
        expect(fetch.mock.calls[1][1].method).toBe('DELETE')
    })

    it('should return subscribers for an encoded device id', async () => {
        fetch.mockResolvedValueOnce(response(200, [100, 300]))

        await expect(client.listSubscribers('cam/1')).resolves.toEqual([100, 300])
        expect(fetch.mock.calls[0][0]).toBe('http://registry.test/subscribers/cam%2F1')
    })

    it('should return the devices a chat follows', async () => {
        fetch.mockResolvedValueOnce(response(200, [{ device_id: 'cam1', nickname: null }]))

        await expect(client.listUserDevices(100)).resolves.toEqual([{ device_id: 'cam1', nickname: null }])
        expect(fetch.mock.calls[0][0]).toBe('http://registry.test/users/100/devices')
    })

    it('should carry the registry error code and status', async () => {
        fetch.mockResolvedValueOnce(response(409, { error: 'chat_id 200 is not registered', code: 'REFERENTIAL_INTEGRITY' }))

        const error = await client.bind(200, 'cam1').catch((e: unknown) => e)

        expect(error).toBeInstanceOf(RegistryClientError)
        if (error instanceof RegistryClientError) {
            expect(error.message).toBe('chat_id 200 is not registered')
            expect(error.code).toBe('REFERENTIAL_INTEGRITY')
            expect(error.status).toBe(409)
            expect(error.retryable).toBe(false)
        }
    })

    it('should fall back to a generic error for unparseable bodies', async () => {
        fetch.mockResolvedValueOnce({ ok: false, status: 502, json: async () => Promise.reject(new Error('not json')) })

        await expect(client.listSubscribers('cam1')).rejects.toMatchObject({
            message: 'Registry responded with 502',
            code: 'REGISTRY_ERROR',
            status: 502,
            retryable: true,
        })
    })

    it('should report an unreachable registry', async () => {
        fetch.mockRejectedValueOnce(new Error('connect ECONNREFUSED'))

        await expect(client.registerDevice('cam1', 'kitchen')).rejects.toMatchObject({
            code: 'REGISTRY_UNREACHABLE',
            retryable: true,
        })
    })

    it('should reject payloads of the wrong shape', async () => {
        fetch.mockResolvedValueOnce(response(200, { subscribers: [100] }))

        await expect(client.listSubscribers('cam1')).rejects.toMatchObject({ code: 'INVALID_RESPONSE' })
    })
})
