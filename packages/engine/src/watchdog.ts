export interface RunWatchdogOptions {
  /** Longest tolerated gap between progress signals */
  maxIdleMs: number;
  onStall: (idleMs: number) => void;
  /** Defaults to a quarter of maxIdleMs, at least one second */
  checkIntervalMs?: number;
  now?: () => number;
}

/**
 * Fires `onStall` once when no `touch()` has arrived within `maxIdleMs`.
 * Must be stopped by its owner; the interval keeps running until then.
 */
export class RunWatchdog {
  private lastProgress: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private fired = false;
  private readonly now: () => number;

  constructor(private readonly options: RunWatchdogOptions) {
    this.now = options.now ?? Date.now;
    this.lastProgress = this.now();
  }

  start(): void {
    if (this.timer) return;
    this.lastProgress = this.now();
    const interval = this.options.checkIntervalMs ?? Math.max(1000, Math.floor(this.options.maxIdleMs / 4));
    this.timer = setInterval(() => this.check(), interval);
  }

  touch(): void {
    this.lastProgress = this.now();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get stalled(): boolean {
    return this.fired;
  }

  private check(): void {
    if (this.fired) return;
    const idleMs = this.now() - this.lastProgress;
    if (idleMs >= this.options.maxIdleMs) {
      this.fired = true;
      this.stop();
      this.options.onStall(idleMs);
    }
  }
}
