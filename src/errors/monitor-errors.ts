// src/errors/monitor-errors.ts

export const MonitorErrorCode = {
    CONFIGURATION: 'CONFIGURATION',
    TRANSIENT_REMOTE: 'TRANSIENT_REMOTE',
    DATA_INTEGRITY: 'DATA_INTEGRITY',
    PERSISTENCE: 'PERSISTENCE',
    RENDER: 'RENDER',
} as const

export type MonitorErrorCode = (typeof MonitorErrorCode)[keyof typeof MonitorErrorCode]

export abstract class MonitorError extends Error {
    abstract readonly code: MonitorErrorCode

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

/** Missing or malformed credentials, unknown customer, invalid config file. */
export class ConfigurationError extends MonitorError {
    readonly code = MonitorErrorCode.CONFIGURATION

    static missingVariable(variable: string) {
        return new ConfigurationError(`environment variable [${variable}] is not set`)
    }

    static malformedCredential(variable: string, fields: number) {
        return new ConfigurationError(
            `credential in [${variable}] has ${fields} field(s), expected directoryId;clientId;secret`
        )
    }

    static unknownCustomer(name: string) {
        return new ConfigurationError(`customer [${name}] is not configured`)
    }
}

/** Identity provider or health endpoint call failed; skip the tenant this cycle. */
export class TransientRemoteError extends MonitorError {
    readonly code = MonitorErrorCode.TRANSIENT_REMOTE

    constructor(
        message: string,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

/** Empty or malformed dataset handed to aggregation. */
export class DataIntegrityError extends MonitorError {
    readonly code = MonitorErrorCode.DATA_INTEGRITY

    static emptyDataset(scope: string) {
        return new DataIntegrityError(`no status records to analyze for ${scope}`)
    }
}

export class PersistenceError extends MonitorError {
    readonly code = MonitorErrorCode.PERSISTENCE

    static operationFailed(operation: string, cause: unknown) {
        return new PersistenceError(`${operation} failed: ${describeError(cause)}`, { cause })
    }
}

export class RenderError extends MonitorError {
    readonly code = MonitorErrorCode.RENDER
}

export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e)
}
