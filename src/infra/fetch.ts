// src/infra/fetch.ts
import { fetch, ProxyAgent, type Dispatcher, type RequestInit } from 'undici'
import { ENV } from '@/config/env.js'

// shared by every request of the run when HTTP_PROXY is set
const proxyAgent = ENV.HTTP_PROXY ? new ProxyAgent(ENV.HTTP_PROXY) : undefined

export interface HttpOptions {
    timeoutMs: number
    /** overrides the proxy agent; tests pass a MockAgent */
    dispatcher?: Dispatcher
}

export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        readonly statusText: string,
        readonly body: string
    ) {
        super(`HTTP ${status} ${statusText}`)
        this.name = 'HttpStatusError'
    }
}

/**
 * One bounded attempt, body included: aborts after `timeoutMs`, throws on
 * transport errors and on non-2xx responses.
 */
export async function fetchJson(
    url: string,
    init: Omit<RequestInit, 'signal' | 'dispatcher'>,
    http: HttpOptions
): Promise<unknown> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), http.timeoutMs)

    try {
        const res = await fetch(url, {
            ...init,
            signal: controller.signal,
            dispatcher: http.dispatcher ?? proxyAgent,
        })

        if (!res.ok) {
            throw new HttpStatusError(res.status, res.statusText, await res.text())
        }

        return await res.json()
    } finally {
        clearTimeout(timeout)
    }
}
