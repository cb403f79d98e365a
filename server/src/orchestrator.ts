import { RunExecutor } from "./executor.js";
import { isTerminalRunStatus, RunManager, type RunInput, type RunStatus } from "./run_manager.js";
import { createCasePipeline, type CasePipelineDeps, type RunFailure, type RunOutcome } from "./pipeline/case_pipeline.js";

/**
 * The boundary the presentation layer talks to: start a case, poll it, cancel it.
 * Independent cases run concurrently up to `config.concurrency`.
 */
export class CaseOrchestrator {
  readonly runs: RunManager;
  readonly executor: RunExecutor;

  constructor(deps: CasePipelineDeps, runs: RunManager = new RunManager()) {
    this.runs = runs;
    this.executor = new RunExecutor(runs, createCasePipeline(deps), { concurrency: deps.config.concurrency });
  }

  startRun(input: RunInput): string {
    const run = this.runs.createRun(input);
    this.executor.enqueue(run.runId);
    return run.runId;
  }

  getStatus(runId: string): RunStatus | null {
    return this.runs.getRun(runId);
  }

  cancel(runId: string): boolean {
    return this.executor.cancel(runId);
  }

  /** Resolves once the run reaches a terminal status. */
  waitForRun(runId: string): Promise<RunStatus> {
    return new Promise((resolve, reject) => {
      const settleIfDone = (): boolean => {
        const status = this.runs.getRun(runId);
        if (!status) {
          reject(new Error(`Unknown run: ${runId}`));
          return true;
        }
        if (!isTerminalRunStatus(status.status)) return false;
        resolve(status);
        return true;
      };

      if (settleIfDone()) return;
      const unsubscribe = this.runs.subscribe(runId, (type) => {
        if (type === "run_finished" && settleIfDone()) unsubscribe?.();
      });
    });
  }

  async run(input: RunInput): Promise<RunOutcome> {
    const runId = this.startRun(input);
    const status = await this.waitForRun(runId);
    const { record } = status;
    if (status.status === "completed" && record.report) {
      return { ok: true, report: record.report, history: record.history, record };
    }
    const failure: RunFailure = status.failure ?? { stage: null, kind: "Internal", category: "Fatal", message: "Run ended without a failure reason", attempts: 0 };
    return { ok: false, failure, history: record.history, record };
  }
}
