import { errorMessage } from "../lib/errors";

export type PeriodicTaskOptions = {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
};

/**
 * Runs `run` every `intervalMs`. A tick that fires while the previous run is
 * still going is skipped, so runs never overlap. Failures are logged and the
 * schedule continues.
 */
export class PeriodicTask {
  private readonly options: PeriodicTaskOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<void> | null = null;
  private skippedTicks = 0;

  constructor(options: PeriodicTaskOptions) {
    this.options = options;
  }

  get name(): string {
    return this.options.name;
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  get skipped(): number {
    return this.skippedTicks;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
  }

  /** One run, unless a run is already in progress. Never rejects. */
  tick(): Promise<void> {
    if (this.running) {
      this.skippedTicks += 1;
      console.log(`${this.options.name}: previous run still in progress, skipping tick`);
      return Promise.resolve();
    }
    const run = this.options
      .run()
      .catch((err: unknown) => {
        console.error(`${this.options.name}: run failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.running = null;
      });
    this.running = run;
    return run;
  }

  /** Clears the timer and waits for a run in progress to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }
}
