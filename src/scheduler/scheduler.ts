/**
 * Cost Scheduler
 *
 * Runs the detection pipeline on a cron expression (hourly by default) and,
 * when an export file is configured, re-ingests it on its own cron.
 * A tick that fires while the previous pipeline run is still going is skipped.
 * stop() stops the cron tasks, cancels the in-flight run and waits for it.
 */

import * as cron from 'node-cron';

export interface SchedulerJobs {
  detectionCron: string;
  /** One pipeline pass; the signal fires on shutdown. */
  detect: (signal: AbortSignal) => Promise<unknown>;
  ingestCron?: string;
  ingest?: () => unknown;
}

export class CostScheduler {
  private tasks: cron.ScheduledTask[] = [];
  private controller = new AbortController();
  private inFlight: Promise<void> | null = null;
  private stopping = false;

  constructor(private jobs: SchedulerJobs) {}

  get running(): boolean {
    return this.tasks.length > 0;
  }

  start(): void {
    if (this.running) {
      console.error('[costguard] Scheduler already running, skipping start');
      return;
    }

    assertValidCron(this.jobs.detectionCron);
    const { ingest, ingestCron } = this.jobs;
    if (ingest && ingestCron) {
      assertValidCron(ingestCron);
    }

    this.tasks.push(
      cron.schedule(this.jobs.detectionCron, () => {
        void this.triggerDetection();
      })
    );

    if (ingest && ingestCron) {
      this.tasks.push(cron.schedule(ingestCron, () => this.runIngest(ingest)));
      console.error(`[costguard] Ingest scheduled: ${ingestCron}`);
    }

    console.error(`[costguard] Detection scheduled: ${this.jobs.detectionCron}`);
  }

  /**
   * Run one detection pass now unless one is already in flight.
   * Resolves false when the pass was skipped.
   */
  async triggerDetection(): Promise<boolean> {
    if (this.stopping) return false;
    if (this.inFlight) {
      console.error('[costguard] Previous detection run still in progress, skipping tick');
      return false;
    }

    const startedAt = Date.now();
    console.error(`[costguard] Detection run started at ${new Date(startedAt).toISOString()}`);

    this.inFlight = this.jobs
      .detect(this.controller.signal)
      .then(
        () => {
          console.error(`[costguard] Detection run finished in ${Date.now() - startedAt}ms`);
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[costguard] Detection run failed: ${message}`);
        }
      )
      .finally(() => {
        this.inFlight = null;
      });

    await this.inFlight;
    return true;
  }

  /**
   * Stop scheduling, cancel the in-flight run and wait for it to settle.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    this.controller.abort();
    if (this.inFlight) {
      console.error('[costguard] Waiting for in-flight detection run to finish');
      await this.inFlight;
    }
    console.error('[costguard] Scheduler stopped');
  }

  private runIngest(ingest: () => unknown): void {
    try {
      const result = ingest();
      console.error(`[costguard] Ingest finished: ${JSON.stringify(result)}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[costguard] Ingest failed: ${message}`);
    }
  }
}

function assertValidCron(expression: string): void {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression: ${expression}`);
  }
}

/**
 * Stop the scheduler on SIGINT/SIGTERM, then exit.
 */
export function installShutdownHandlers(scheduler: CostScheduler): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    console.error(`[costguard] Received ${signal}, shutting down`);
    scheduler.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[costguard] Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
