// src/health/health-band.ts

/** Display policy for the healthy percentage; independent of the OK threshold. */
export interface HealthBands {
    good: number
    warning: number
}

export type HealthBand = 'good' | 'warning' | 'critical'

export const DEFAULT_HEALTH_BANDS: HealthBands = {
    good: 97,
    warning: 95,
}

export function bandOf(percent: number, bands: HealthBands = DEFAULT_HEALTH_BANDS): HealthBand {
    if (percent >= bands.good) return 'good'

    if (percent >= bands.warning) return 'warning'

    return 'critical'
}
