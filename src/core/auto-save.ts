import { logger } from '../observability/logger';
import { describeError } from './errors';

const log = logger.child('auto-save');

type AutoSaveOpts = {
  intervalMs: number;
  save: () => Promise<void>;
};

/** Periodic save of the shared tree; independent of any conversation's processing state. */
export class AutoSaveTask {
  private intervalMs: number;
  private save: () => Promise<void>;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(opts: AutoSaveOpts) {
    this.intervalMs = opts.intervalMs;
    this.save = opts.save;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start() {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      void this.flush();
    }, this.intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Runs a save now, or joins the one already running. */
  flush(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.runSave().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runSave() {
    try {
      await this.save();
      log.debug('auto-save done');
    } catch (err) {
      log.warn('auto-save failed', { error: describeError(err) });
    }
  }
}
