import { errorMessage } from '@/utils/helpers';
import { logger, type AppLogger } from '@/utils/logger';

/**
 * Tracks in-flight tasks so shutdown and tests can wait for them. Each task runs
 * exactly once; a rejection is logged and never reaches the scheduler.
 */
export class BackgroundTasks {
  private readonly inFlight = new Set<Promise<void>>();
  private completed = 0;
  private failed = 0;

  constructor(private readonly log: AppLogger = logger) {}

  /** `log` receives the single failure line; it defaults to the runner's logger. */
  schedule(name: string, task: () => Promise<void>, log: AppLogger = this.log): void {
    const run = Promise.resolve()
      .then(task)
      .then(
        () => {
          this.completed++;
        },
        (err: unknown) => {
          this.failed++;
          log.error('background:task_failed', { task: name, reason: errorMessage(err) });
        },
      )
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  stats(): { pending: number; completed: number; failed: number } {
    return { pending: this.inFlight.size, completed: this.completed, failed: this.failed };
  }

  /** Resolves once every task scheduled so far (and any they schedule) has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
