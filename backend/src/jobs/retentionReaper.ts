import cron, { ScheduledTask } from 'node-cron';
import { SharedFileRepository } from '../database/models/File';
import { RetentionConfig } from '../config/config';
import { isBackendUnavailable } from '../errors';
import { SweepResult } from '../types';

/**
 * Retention Reaper
 * Periodically removes expired shared links and the files they pointed at
 */
export class RetentionReaper {
  private task: ScheduledTask | null = null;
  private running: Promise<SweepResult> | null = null;
  private lastRun?: Date;
  private lastResult?: SweepResult;

  constructor(
    private readonly files: SharedFileRepository,
    private readonly retention: RetentionConfig
  ) {}

  /**
   * Start the cleanup schedule
   */
  start(): void {
    if (this.task) {
      return;
    }

    const schedule = this.retention.cleanupSchedule;
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid retention cleanup schedule: "${schedule}"`);
    }

    this.task = cron.schedule(schedule, () => {
      void this.runScheduled();
    }, {
      scheduled: true,
      timezone: 'UTC'
    });

    console.log(`🕐 Retention cleanup scheduled: ${schedule}`);

    if (this.retention.runOnStartup) {
      void this.runScheduled();
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('🛑 Retention cleanup stopped');
    }
  }

  /**
   * Sweep now. A call made while a sweep is in flight joins that sweep
   * instead of starting a second one.
   */
  async runNow(): Promise<SweepResult> {
    if (this.running) {
      console.log('⏳ Retention cleanup already running, joining...');
      return this.running;
    }

    this.running = this.sweep();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  getStatus(): { scheduled: boolean; running: boolean; lastRun?: Date; lastResult?: SweepResult } {
    return {
      scheduled: this.task !== null,
      running: this.running !== null,
      lastRun: this.lastRun,
      lastResult: this.lastResult
    };
  }

  private async sweep(): Promise<SweepResult> {
    this.lastRun = new Date();
    const result = await this.files.deleteExpiredLinks();
    this.lastResult = result;

    if (result.linksDeleted === 0) {
      console.log('🧹 No expired shared links to delete');
    } else {
      console.log(`🧹 Retention cleanup removed ${result.linksDeleted} shared link(s) and ${result.filesDeleted} file(s)`);
    }

    return result;
  }

  // Scheduled ticks report failures and leave the schedule in place
  private async runScheduled(): Promise<void> {
    try {
      await this.runNow();
    } catch (error) {
      if (isBackendUnavailable(error)) {
        console.warn('⚠️  Database unavailable, retention cleanup will retry on the next tick:', error);
      } else {
        console.error('❌ Retention cleanup failed:', error);
      }
    }
  }
}
