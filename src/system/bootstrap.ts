import type { RunContext } from './context.js'
import { runScan } from './run-modes/scan.js'
import { runReport } from './run-modes/report.js'
import { ALL_CUSTOMERS } from '@/report/report-assembler.js'
import { findTenant } from '@/config/monitor-config.js'

export const RUN_MODES = ['scan', 'report'] as const
export type RunMode = (typeof RUN_MODES)[number]

export type Ask = (question: string) => Promise<string>

export function isRunMode(value: string): value is RunMode {
    return (RUN_MODES as readonly string[]).includes(value)
}

/**
 * Mode from the flag, or asked for. Undefined when unrecognized.
 */
export async function selectMode(ctx: RunContext, given: string | undefined, ask: Ask) {
    const { logger } = ctx
    let mode = given
    if (!mode) {
        logger.info('select task to perform')
        logger.info('scan - connect with customer API to obtain service health info')
        logger.info('report - prepare a summary service health report email')
        mode = (await ask('Chosen task [scan / report]: ')).trim()
    }

    if (!isRunMode(mode)) {
        logger.error(`option [${mode}] not recognized`)
        return undefined
    }
    logger.info(`proceeding with ${mode}`)
    return mode
}

/**
 * Customer from the flag, or asked for after listing the options.
 * Returns the normalized name or `all`; undefined when unrecognized.
 */
export async function selectCustomer(ctx: RunContext, given: string | undefined, ask: Ask) {
    const { logger, config } = ctx
    let customer = given
    if (!customer) {
        logger.info('customer argument not provided - options:')
        logger.info(`> ${ALL_CUSTOMERS}`)
        for (const t of config.tenants) logger.info(`> ${t.name}`)
        customer = (await ask('Chosen customer: ')).trim()
    }

    const normalized = customer.toLowerCase()
    if (normalized !== ALL_CUSTOMERS && !findTenant(config, normalized)) {
        logger.error(`customer [${customer}] not recognized in configuration`)
        return undefined
    }
    logger.info('customer valid, proceeding', { customer: normalized })
    return normalized
}

/**
 * Entry point of a run; resolves to the process exit code.
 */
export async function bootstrap(
    ctx: RunContext,
    args: { mode?: string; customer?: string },
    ask: Ask
): Promise<number> {
    const mode = await selectMode(ctx, args.mode, ask)
    if (!mode) return 1

    if (mode === 'scan') {
        await runScan(ctx)
        return 0
    }

    const customer = await selectCustomer(ctx, args.customer, ask)
    if (!customer) return 1

    await runReport(ctx, customer)
    return 0
}
