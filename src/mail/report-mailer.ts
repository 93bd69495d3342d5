// src/mail/report-mailer.ts
import path from 'node:path'
import nodemailer, { type Transporter } from 'nodemailer'
import type { TenantConfig, TenantReport } from '@/types/health.js'
import type { Logger } from '@/logging/logger.js'
import type { HealthBands } from '@/health/health-band.js'
import { renderReportHtml } from '@/report/report-html.js'
import { TransientRemoteError, describeError } from '@/errors/monitor-errors.js'
import { err, ok, type Result } from '@/types/result.js'
import { formatMinute } from '@/utils/time.js'

export interface MailConfig {
    host: string
    port: number
    secure: boolean
    from: string
    subject: string
    signature: string
}

export interface InlineImage {
    filename: string
    path: string
    cid: string
}

export interface ReportMessage {
    from: string
    to: string
    cc?: string
    subject: string
    html: string
    attachments: InlineImage[]
}

export function buildReportMessage(
    report: TenantReport,
    tenant: Pick<TenantConfig, 'mailTo' | 'mailCc'>,
    mail: Pick<MailConfig, 'from' | 'subject' | 'signature'>,
    bands: HealthBands,
    now: Date
): ReportMessage {
    const attachments: InlineImage[] = report.services.flatMap((s) =>
        s.chart ? [{ filename: path.basename(s.chart.path), path: s.chart.path, cid: s.chart.contentId }] : []
    )

    return {
        from: mail.from,
        to: tenant.mailTo,
        ...(tenant.mailCc ? { cc: tenant.mailCc } : {}),
        subject: `[${report.tenant}] ${mail.subject} - ${formatMinute(now)}`,
        html: `Hello, <br /><br />${renderReportHtml(report, bands)}${mail.signature}`,
        attachments,
    }
}

export class ReportMailer {
    private readonly transporter: Transporter
    private readonly logger: Logger

    constructor(transporter: Transporter, logger: Logger = console) {
        this.transporter = transporter
        this.logger = logger
    }

    static smtp(mail: Pick<MailConfig, 'host' | 'port' | 'secure'>, logger?: Logger) {
        return new ReportMailer(
            nodemailer.createTransport({ host: mail.host, port: mail.port, secure: mail.secure }),
            logger
        )
    }

    async send(message: ReportMessage): Promise<Result<string, TransientRemoteError>> {
        try {
            const info = await this.transporter.sendMail({
                ...message,
                attachments: message.attachments.map((a) => ({ ...a, contentDisposition: 'inline' as const })),
            })
            this.logger.info('[mail] report sent', { to: message.to, subject: message.subject })
            return ok(String(info.messageId))
        } catch (e) {
            this.logger.error('[mail] message sending failed', { to: message.to, error: describeError(e) })
            return err(new TransientRemoteError(`mail dispatch failed: ${describeError(e)}`, undefined, { cause: e }))
        }
    }

    close() {
        this.transporter.close()
    }
}
