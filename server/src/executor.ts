import type { RunManager } from "./run_manager.js";
import type { PipelineFn, RunOutcome } from "./pipeline/case_pipeline.js";
import { errorMessage, nowIso } from "./pipeline/utils.js";

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  /**
   * Running cases stop at their next stage boundary; queued cases are dropped before they start.
   */
  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      if (ctrl.signal.aborted) return true;
      this.runs.log(runId, "Cancellation requested; stopping at the next stage boundary");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      this.runs.setState(runId, "failed");
      this.runs.setRunStatus(runId, "cancelled", {
        finishedAt: nowIso(),
        failure: { stage: null, kind: "Cancelled", category: "Fatal", message: "Cancelled while queued", attempts: 0 }
      });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next === undefined) break;
      void this.start(next);
    }
  }

  private async start(runId: string): Promise<void> {
    const controller = new AbortController();
    this.running.set(runId, controller);
    this.runs.setRunStatus(runId, "running");

    try {
      const outcome: RunOutcome = await this.pipeline({ runId }, this.runs, { signal: controller.signal });
      if (outcome.ok) {
        this.runs.setRunStatus(runId, "completed", { finishedAt: nowIso() });
      } else {
        const cancelled = outcome.failure.kind === "Cancelled";
        if (!cancelled) this.runs.error(runId, `${outcome.failure.kind}: ${outcome.failure.message}`, outcome.failure.stage ?? undefined);
        this.runs.setRunStatus(runId, cancelled ? "cancelled" : "failed", { finishedAt: nowIso(), failure: outcome.failure });
      }
    } catch (err) {
      const msg = errorMessage(err);
      this.runs.error(runId, msg);
      this.runs.setState(runId, "failed");
      this.runs.setRunStatus(runId, "failed", {
        finishedAt: nowIso(),
        failure: { stage: null, kind: "Internal", category: "Fatal", message: msg, attempts: 0 }
      });
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
