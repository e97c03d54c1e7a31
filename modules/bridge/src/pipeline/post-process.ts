import type { PostProcessOverride, PostProcessSettings } from '../schemas/config'
import type { PostProcessor } from '../types'
import { withTimeout } from '../util/timing'

export type EffectivePostProcess = PostProcessSettings

/** Server override fields win over the global settings. */
export function resolvePostProcess(global: PostProcessSettings, override?: PostProcessOverride): EffectivePostProcess {
  return {
    enabled: override?.enabled ?? global.enabled,
    thresholdChars: override?.thresholdChars ?? global.thresholdChars,
    maxOutputChars: override?.maxOutputChars ?? global.maxOutputChars,
  }
}

export function shouldPostProcess(settings: EffectivePostProcess, raw: string): boolean {
  return settings.enabled && raw.length > settings.thresholdChars
}

/** Runs the processor within `budgetMs`; rejects on failure or timeout. */
export function runPostProcessor(
  processor: PostProcessor,
  raw: string,
  settings: EffectivePostProcess,
  capability: string,
  budgetMs: number,
): Promise<string> {
  return withTimeout(budgetMs, (signal) =>
    processor(raw, {
      threshold: settings.thresholdChars,
      maxOutputSize: settings.maxOutputChars,
      capability,
      signal,
    }),
  )
}

/**
 * Keeps the head of an oversized result. Used when no summarizing processor
 * is configured.
 */
export const truncatingPostProcessor: PostProcessor = async (raw, { maxOutputSize }) => {
  if (raw.length <= maxOutputSize) return raw
  const omitted = raw.length - maxOutputSize
  return `${raw.slice(0, maxOutputSize)}\n... [truncated ${omitted} chars]`
}
