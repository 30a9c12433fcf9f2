import { log } from "../utils/log";
import type { LifecycleManager, SweepReport } from "./manager";

/**
 * Runs the retention sweep on a timer. A sweep that is still running when
 * the next tick fires is not started twice.
 */
export class Sweeper {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<SweepReport | null> | null = null;

  constructor(
    private readonly manager: LifecycleManager,
    private readonly intervalMs: number,
  ) {}

  start(): void {
    if (this.timer) return;
    void this.runOnce();
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }

  /** Resolves to null when a sweep was already in flight or failed. */
  runOnce(): Promise<SweepReport | null> {
    if (this.running) return Promise.resolve(null);
    this.running = this.manager
      .sweep()
      .catch((err: unknown) => {
        log.error("sweeper", "sweep failed", err);
        return null;
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }
}
