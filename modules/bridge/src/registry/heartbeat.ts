/**
 * Fixed-interval driver for the registry's heartbeat tick. A tick that is
 * still running when the next interval fires is not overlapped.
 */

import type { Logger } from '@mcpmux/observability'

import { MAX_TIMER_MS } from '../util/timing'

export interface HeartbeatSchedulerConfig {
  /** Tick interval in milliseconds (default: 60000 = 1 minute). */
  intervalMs?: number
  tick: () => Promise<void>
  logger?: Logger
}

export class HeartbeatScheduler {
  private timer: ReturnType<typeof setInterval> | null = null
  private running: Promise<void> | null = null
  private readonly intervalMs: number
  private readonly tick: () => Promise<void>
  private readonly logger?: Logger

  constructor(config: HeartbeatSchedulerConfig) {
    this.intervalMs = Math.min(MAX_TIMER_MS, config.intervalMs ?? 60_000)
    this.tick = config.tick
    this.logger = config.logger
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => this.runTick(), this.intervalMs)
    this.timer.unref()
  }

  /** Stop the loop and wait for an in-flight tick to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.running) await this.running
  }

  get isRunning(): boolean {
    return this.timer !== null
  }

  private runTick(): void {
    if (this.running) return
    this.running = this.tick()
      .catch((err) => {
        this.logger?.error({ err }, 'Heartbeat tick failed')
      })
      .finally(() => {
        this.running = null
      })
  }
}
