// src/auth/credentials.ts
import type { TenantConfig } from '@/types/health.js'
import { ConfigurationError } from '@/errors/monitor-errors.js'
import { err, ok, type Result } from '@/types/result.js'

export interface TenantCredentials {
    directoryId: string
    clientId: string
    secret: string
}

export const CREDENTIAL_SEPARATOR = ';'

/**
 * Reads `directoryId;clientId;secret` from the tenant's environment variable.
 */
export function resolveCredentials(
    tenant: Pick<TenantConfig, 'credentialVariable'>,
    env: NodeJS.ProcessEnv = process.env
): Result<TenantCredentials, ConfigurationError> {
    const variable = tenant.credentialVariable
    const raw = env[variable]
    if (!raw) {
        return err(ConfigurationError.missingVariable(variable))
    }

    const fields = raw.split(CREDENTIAL_SEPARATOR).map((f) => f.trim())
    if (fields.length !== 3) {
        return err(ConfigurationError.malformedCredential(variable, fields.length))
    }

    const [directoryId, clientId, secret] = fields
    if (!directoryId || !clientId || !secret) {
        return err(new ConfigurationError(`credential in [${variable}] has an empty field`))
    }

    return ok({ directoryId, clientId, secret })
}
