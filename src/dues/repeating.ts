import { type TimerHandle, type TimerService } from "./types";

/**
 * A job that runs its body, then re-arms itself after the interval.
 * A slow body delays the next tick instead of overlapping it.
 *
 * Every start/stop bumps the generation: a body still in flight from an
 * older generation completes but does not re-arm.
 */
export class RepeatingTask {
  private handle: TimerHandle | null = null;
  private generation = 0;
  private intervalSeconds: number | null = null;

  constructor(
    readonly name: string,
    private readonly timers: TimerService,
    private readonly body: () => Promise<void>,
  ) {}

  get running(): boolean {
    return this.intervalSeconds !== null;
  }

  get interval(): number | null {
    return this.intervalSeconds;
  }

  /**
   * (Re)starts the job: any pending tick is cancelled first.
   */
  start(intervalSeconds: number): void {
    this.stop();
    this.intervalSeconds = intervalSeconds;
    this.arm(this.generation, intervalSeconds);
    console.log(`[Scheduler] Job ${this.name} repeating every ${intervalSeconds}s`);
  }

  stop(): void {
    this.generation++;
    if (this.handle) {
      this.handle.cancel();
      this.handle = null;
    }
    this.intervalSeconds = null;
  }

  private arm(generation: number, intervalSeconds: number): void {
    this.handle = this.timers.runOnce(() => this.tick(generation), intervalSeconds);
  }

  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation) {
      return;
    }
    this.handle = null;

    try {
      await this.body();
    } catch (e) {
      console.error(`[Scheduler] Job ${this.name} failed: ${e}`);
    }

    if (generation === this.generation && this.intervalSeconds !== null) {
      this.arm(generation, this.intervalSeconds);
    }
  }
}
