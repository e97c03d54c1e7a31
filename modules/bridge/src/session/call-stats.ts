export interface CapabilityCallStats {
  calls: number
  successes: number
  failures: number
  successRate: number
  /** Mean over successful calls only. */
  meanDurationMs: number
  lastCallAt: number | null
  lastError: string | null
}

interface MutableStats {
  calls: number
  successes: number
  failures: number
  successDurationMs: number
  lastCallAt: number | null
  lastError: string | null
}

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

function snapshot(stats: MutableStats): CapabilityCallStats {
  return {
    calls: stats.calls,
    successes: stats.successes,
    failures: stats.failures,
    successRate: stats.calls > 0 ? round2(stats.successes / stats.calls) : 0,
    meanDurationMs: stats.successes > 0 ? round2(stats.successDurationMs / stats.successes) : 0,
    lastCallAt: stats.lastCallAt,
    lastError: stats.lastError,
  }
}

/** Per-capability call counters for one server. */
export class CallStatsTable {
  private readonly table = new Map<string, MutableStats>()

  record(capability: string, success: boolean, durationMs: number, error?: string): void {
    let stats = this.table.get(capability)
    if (!stats) {
      stats = { calls: 0, successes: 0, failures: 0, successDurationMs: 0, lastCallAt: null, lastError: null }
      this.table.set(capability, stats)
    }
    stats.calls++
    stats.lastCallAt = Date.now()
    if (success) {
      stats.successes++
      stats.successDurationMs += durationMs
    } else {
      stats.failures++
      stats.lastError = error ?? null
    }
  }

  get(capability: string): CapabilityCallStats | undefined {
    const stats = this.table.get(capability)
    return stats ? snapshot(stats) : undefined
  }

  /** Totals across every capability of the server. */
  totals(): { attempts: number; successes: number; failures: number; meanDurationMs: number } {
    let attempts = 0
    let successes = 0
    let failures = 0
    let duration = 0
    for (const stats of this.table.values()) {
      attempts += stats.calls
      successes += stats.successes
      failures += stats.failures
      duration += stats.successDurationMs
    }
    return { attempts, successes, failures, meanDurationMs: successes > 0 ? round2(duration / successes) : 0 }
  }
}
