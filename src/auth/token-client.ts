// src/auth/token-client.ts
import { z } from 'zod'
import { TransientRemoteError, describeError } from '@/errors/monitor-errors.js'
import { fetchJson, HttpStatusError, type HttpOptions } from '@/infra/fetch.js'
import { err, ok, type Result } from '@/types/result.js'
import type { TenantCredentials } from './credentials.js'

export interface IdentityOptions {
    authority: string
    scope: string
}

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
})

const tokenErrorSchema = z.object({
    error: z.string().optional(),
    error_description: z.string().optional(),
})

function parseBody(body: string): unknown {
    try {
        return JSON.parse(body)
    } catch {
        return undefined
    }
}

function providerReason(json: unknown) {
    const parsed = tokenErrorSchema.safeParse(json)
    return parsed.success ? parsed.data.error_description ?? parsed.data.error : undefined
}

export function tokenUrl(identity: IdentityOptions, directoryId: string) {
    return `${identity.authority.replace(/\/+$/, '')}/${encodeURIComponent(directoryId)}/oauth2/v2.0/token`
}

/**
 * Client-credential grant, single attempt. Resolves to the bearer token.
 */
export async function acquireToken(
    credentials: TenantCredentials,
    identity: IdentityOptions,
    http: HttpOptions
): Promise<Result<string, TransientRemoteError>> {
    const body = new URLSearchParams({
        client_id: credentials.clientId,
        client_secret: credentials.secret,
        scope: identity.scope,
        grant_type: 'client_credentials',
    })

    let json: unknown
    try {
        json = await fetchJson(
            tokenUrl(identity, credentials.directoryId),
            {
                method: 'POST',
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                body: body.toString(),
            },
            http
        )
    } catch (e) {
        if (e instanceof HttpStatusError) {
            const reason = providerReason(parseBody(e.body)) ?? e.message
            return err(new TransientRemoteError(`authentication failed: ${reason}`, e.status, { cause: e }))
        }
        return err(new TransientRemoteError(`authentication request failed: ${describeError(e)}`, undefined, { cause: e }))
    }

    const parsed = tokenResponseSchema.safeParse(json)
    if (!parsed.success) {
        const reason = providerReason(json) ?? 'no access token in response'
        return err(new TransientRemoteError(`authentication failed: ${reason}`))
    }

    return ok(parsed.data.access_token)
}
