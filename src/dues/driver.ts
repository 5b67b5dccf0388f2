import { type Messenger } from "../telegram/messenger";
import { type SchedulerConfig } from "./config";
import { formatReport, type DueCounts } from "./counters";
import { RepeatingTask } from "./repeating";
import { type DueScheduler } from "./scheduler";
import { type TimerService } from "./types";

export type ReconciliationDriverOptions = {
  scheduler: DueScheduler;
  timers: TimerService;
  config: SchedulerConfig;
};

/**
 * Runs reconciliation and the pending notification sweep on their own
 * repeating jobs, and on demand.
 */
export class ReconciliationDriver {
  readonly config: SchedulerConfig;
  readonly scheduler: DueScheduler;
  // Quiet mode: repeating passes do not post status messages
  quiet = true;

  private readonly updates: RepeatingTask;
  private readonly notifications: RepeatingTask;
  // Chat the repeating jobs report to
  private target: Messenger | null = null;

  constructor(options: ReconciliationDriverOptions) {
    this.config = options.config;
    this.scheduler = options.scheduler;
    this.updates = new RepeatingTask("check-due", options.timers, () =>
      this.runRepeatingUpdate(),
    );
    this.notifications = new RepeatingTask("check-notifications", options.timers, () =>
      this.runRepeatingNotifications(),
    );
  }

  get updatesRunning(): boolean {
    return this.updates.running;
  }

  get notificationsRunning(): boolean {
    return this.notifications.running;
  }

  /**
   * Rescans cards tracking due dates. Unless quiet, a status message
   * follows the scan and ends with the outcome report.
   */
  async update(messenger: Messenger, quiet: boolean): Promise<DueCounts> {
    if (quiet) {
      return this.scheduler.checkDue(messenger);
    }

    return messenger.withSpawned("*Status*: Scanning for updates...", async (status) => {
      try {
        const counts = await this.scheduler.checkDue(status);
        await status.override(`*Status*: Done. ${formatReport(counts)}`);
        return counts;
      } catch (e) {
        await status.override(`*Status*: Failed. ${e}`);
        throw e;
      }
    });
  }

  /**
   * Explicit rescan requested by the user: never quiet.
   */
  rescan(messenger: Messenger): Promise<DueCounts> {
    return this.update(messenger, false);
  }

  scheduleRepeatingUpdates(messenger: Messenger): void {
    this.target = messenger;
    this.updates.start(this.config.updateIntervalMinutes * 60);
  }

  scheduleRepeatingNotifications(messenger: Messenger): void {
    this.target = messenger;
    if (this.config.notificationIntervalHours === null) {
      this.cancelRepeatingNotifications();
      return;
    }
    this.notifications.start(this.config.notificationIntervalHours * 3600);
  }

  cancelRepeatingNotifications(): void {
    this.notifications.stop();
  }

  /**
   * Changes the update interval, re-arming the job if it runs.
   */
  setUpdateInterval(minutes: number): void {
    this.config.updateIntervalMinutes = minutes;
    if (this.updates.running && this.target) {
      this.scheduleRepeatingUpdates(this.target);
    }
  }

  /**
   * Changes the notification interval; null turns the sweep off.
   */
  setNotificationInterval(hours: number | null): void {
    this.config.notificationIntervalHours = hours;
    if (hours === null) {
      this.cancelRepeatingNotifications();
    } else if (this.target) {
      this.scheduleRepeatingNotifications(this.target);
    }
  }

  stop(): void {
    this.updates.stop();
    this.notifications.stop();
    this.scheduler.cancelAll();
  }

  private async runRepeatingUpdate(): Promise<void> {
    console.log("[Scheduler] JOB: checking updates");
    if (this.target) {
      await this.update(this.target, this.quiet);
    }
  }

  private async runRepeatingNotifications(): Promise<void> {
    console.log("[Scheduler] JOB: checking notifications");
    if (this.target) {
      await this.scheduler.checkNotifications(this.target);
    }
  }
}
