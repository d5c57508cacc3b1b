// src/jobs/scheduler.ts
// Периодические задачи процесса бота на node-cron.
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { logger, toError } from "../lib/logger";

export type JobDefinition = {
  id: string;
  expression: string;
  run: () => Promise<unknown>;
};

export class JobScheduler {
  private readonly jobs = new Map<string, JobDefinition>();
  private readonly scheduled = new Map<string, ScheduledTask>();
  private readonly running = new Set<string>();
  private started = false;

  register(job: JobDefinition): void {
    const id = job.id.trim();
    if (!id) throw new Error("Job id is required");
    const expression = job.expression.trim();
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for job ${id}: ${expression}`);
    }
    this.jobs.set(id, { ...job, id, expression });
    if (this.started) this.scheduleOne(this.jobs.get(id) ?? job);
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    for (const job of this.jobs.values()) this.scheduleOne(job);
    logger.info("Scheduler started", { action: "scheduler_start", jobs: [...this.jobs.keys()] });
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    for (const task of this.scheduled.values()) task.stop();
    this.scheduled.clear();
    logger.info("Scheduler stopped", { action: "scheduler_stop" });
  }

  /** Один прогон задачи; пока предыдущий не закончился, новый не стартует */
  async runNow(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || this.running.has(id)) return false;
    this.running.add(id);
    try {
      await job.run();
      return true;
    } catch (error) {
      logger.error(`Job ${id} failed`, { action: "job_failed", job: id, error: toError(error) });
      return false;
    } finally {
      this.running.delete(id);
    }
  }

  private scheduleOne(job: JobDefinition): void {
    this.scheduled.get(job.id)?.stop();
    const task = cron.schedule(job.expression, () => {
      void this.runNow(job.id);
    });
    this.scheduled.set(job.id, task);
  }
}
