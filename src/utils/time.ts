// src/utils/time.ts
export const DAY_MS = 24 * 60 * 60_000

const pad = (n: number) => String(n).padStart(2, '0')

function parts(d: Date) {
    return {
        date: `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`,
        hh: pad(d.getUTCHours()),
        mm: pad(d.getUTCMinutes()),
        ss: pad(d.getUTCSeconds()),
    }
}

/** `YYYY-MM-DD HH:MM:SS` in UTC; sorts lexicographically. */
export function formatTimestamp(d: Date) {
    const { date, hh, mm, ss } = parts(d)
    return `${date} ${hh}:${mm}:${ss}`
}

/** `YYYY-MM-DD_HH-MM-SS`, safe for file names. */
export function formatFileStamp(d: Date) {
    const { date, hh, mm, ss } = parts(d)
    return `${date}_${hh}-${mm}-${ss}`
}

export function formatMinute(d: Date) {
    const { date, hh, mm } = parts(d)
    return `${date} ${hh}:${mm}`
}

export function parseTimestamp(ts: string) {
    return new Date(`${ts.replace(' ', 'T')}Z`)
}

export function startOfUtcDay(ts: number) {
    const d = new Date(ts)
    return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()))
}

export function endOfUtcDay(ts: number) {
    const d = new Date(ts)
    return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate(), 23, 59, 59))
}
