import type { CredentialPool, RecoveryReport } from "./pool.js";
import { sleep } from "../lib/concurrency.js";
import { safeErrorMessage } from "../lib/validation.js";

export interface RecoveryLoopOptions {
  intervalMs: number;
  /** Shorter wait used after a cycle throws. */
  errorBackoffMs: number;
}

/**
 * Background loop that runs `pool.recoverFailed()` on a fixed interval until stopped.
 * A cycle that throws never ends the loop; it only shortens the next wait.
 */
export class RecoveryLoop {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private lastReport: RecoveryReport | null = null;
  private cycles = 0;

  constructor(
    private readonly pool: CredentialPool,
    private options: RecoveryLoopOptions,
  ) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Takes effect from the next wait; restart the loop to apply it at once. */
  updateOptions(options: Partial<RecoveryLoopOptions>): void {
    this.options = { ...this.options, ...options };
  }

  stats(): { cycles: number; lastReport: RecoveryReport | null } {
    return { cycles: this.cycles, lastReport: this.lastReport };
  }

  start(): void {
    if (this.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal);
    console.log(`[recovery] loop started (every ${Math.round(this.options.intervalMs / 1000)}s)`);
  }

  /** Cancel the pending sleep or the running cycle and wait for the loop to exit. */
  async stop(): Promise<void> {
    if (!this.running || !this.controller) return;
    this.controller.abort();
    await this.running;
    this.running = null;
    this.controller = null;
    console.log("[recovery] loop stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let wait = this.options.intervalMs;
      try {
        this.lastReport = await this.pool.recoverFailed(signal);
      } catch (err) {
        console.error(`[recovery] cycle failed: ${safeErrorMessage(err, "unknown error")}`);
        wait = this.options.errorBackoffMs;
      }
      this.cycles++;
      await sleep(wait, signal);
    }
  }
}
