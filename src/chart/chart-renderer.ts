// src/chart/chart-renderer.ts
import fs from 'node:fs/promises'
import path from 'node:path'
import sharp from 'sharp'
import type { ChartArtifact, StatusPoint } from '@/types/health.js'
import type { SeverityMap } from '@/health/severity-map.js'
import type { Logger } from '@/logging/logger.js'
import { RenderError, describeError } from '@/errors/monitor-errors.js'
import { err, ok, type Result } from '@/types/result.js'
import { formatFileStamp } from '@/utils/time.js'
import { buildStepChartSvg } from './step-chart.js'

export type Rasterize = (svg: Buffer) => Promise<Buffer>

export interface ChartRendererOptions {
    imagesDir: string
    severity: SeverityMap
    rasterize?: Rasterize
    now?: () => Date
    logger?: Logger
}

const rasterizePng: Rasterize = (svg) => sharp(svg).png().toBuffer()

function safeName(s: string) {
    return s.replace(/[^A-Za-z0-9._-]+/g, '_')
}

export class ChartRenderer {
    private readonly rasterize: Rasterize
    private readonly now: () => Date
    private readonly logger: Logger

    constructor(private readonly opts: ChartRendererOptions) {
        this.rasterize = opts.rasterize ?? rasterizePng
        this.now = opts.now ?? (() => new Date())
        this.logger = opts.logger ?? console
    }

    /**
     * Writes `<imagesDir>/<tenant>/<stamp>_<service>.png` once; never overwrites.
     */
    async render(
        tenant: string,
        service: string,
        points: readonly StatusPoint[]
    ): Promise<Result<ChartArtifact, RenderError>> {
        if (points.length === 0) {
            return err(new RenderError(`no points to chart for ${tenant}/${service}`))
        }

        const fileName = `${formatFileStamp(this.now())}_${safeName(service)}.png`
        const dir = path.join(this.opts.imagesDir, safeName(tenant))
        const file = path.join(dir, fileName)

        try {
            const svg = buildStepChartSvg(points, this.opts.severity, { title: service })
            const png = await this.rasterize(Buffer.from(svg))

            await fs.mkdir(dir, { recursive: true })
            await fs.writeFile(file, png, { flag: 'wx' })
        } catch (e) {
            this.logger.warn('[chart] cannot create chart', { tenant, service, error: describeError(e) })
            return err(new RenderError(`chart for ${tenant}/${service} failed: ${describeError(e)}`, { cause: e }))
        }

        this.logger.info('[chart] saved', { tenant, service, file })
        return ok({ path: file, contentId: `${safeName(tenant)}-${fileName}` })
    }
}
