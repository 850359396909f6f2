/**
 * Repeating Task
 *
 * A job on a fixed interval with a single-flight guard: a timer tick that
 * arrives while the previous run is still going is skipped. Event-driven runs
 * go through trigger(), which coalesces into one follow-up run instead of
 * being dropped, so the last change is always picked up.
 */

export class RepeatingTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private rerun = false;
  private stopped = false;

  constructor(
    readonly name: string,
    private readonly intervalMs: number,
    private readonly run: () => Promise<void>
  ) {}

  get running(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Run now, then every intervalMs
   */
  start(): void {
    if (this.timer) return;
    this.stopped = false;

    void this.tick();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  /**
   * Timer entry point. Resolves false when skipped because a run is in flight.
   */
  async tick(): Promise<boolean> {
    if (this.inFlight) return false;
    await this.execute();
    return true;
  }

  /**
   * Event entry point. Resolves once the run (and any coalesced follow-up) is done.
   */
  trigger(): Promise<void> {
    if (this.inFlight) {
      this.rerun = true;
      return this.inFlight;
    }
    return this.execute();
  }

  /**
   * Stop the timer and wait for the in-flight run
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.rerun = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  private execute(): Promise<void> {
    const runs = async () => {
      do {
        this.rerun = false;
        try {
          await this.run();
        } catch (err) {
          console.error(`[${this.name}] Run failed:`, err);
        }
      } while (this.rerun && !this.stopped);
    };

    const current = runs().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = current;
    return current;
  }
}
