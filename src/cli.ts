// Service health monitor entry
import 'dotenv/config'
import { createInterface } from 'node:readline/promises'
import { Command } from 'commander'
import { ENV } from './config/env.js'
import { loadMonitorConfig } from './config/monitor-config.js'
import { createRunLogger } from './logging/logger.js'
import { bootstrap, type Ask } from './system/bootstrap.js'
import { runPaths } from './system/context.js'
import { describeError } from './errors/monitor-errors.js'

const program = new Command()
    .name('service-health-monitor')
    .description('Poll service health per tenant and mail availability reports')
    .option('-m, --mode <mode>', 'task to perform: scan | report')
    .option('-c, --customer <customer>', 'customer name or "all" (report mode)')
    .parse(process.argv)

const opts = program.opts<{ mode?: string; customer?: string }>()
const paths = runPaths(ENV.DATA_DIR)
const logger = createRunLogger({ logsDir: paths.logsDir, level: ENV.LOG_LEVEL })

const ask: Ask = async (question) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout })
    try {
        return await rl.question(question)
    } finally {
        rl.close()
    }
}

try {
    const config = loadMonitorConfig(ENV.MONITOR_CONFIG)
    const code = await bootstrap(
        { config, paths, logger, env: process.env, now: () => new Date() },
        opts,
        ask
    )
    process.exitCode = code
} catch (e) {
    logger.error('fatal startup error', { error: describeError(e) })
    process.exitCode = 1
}
