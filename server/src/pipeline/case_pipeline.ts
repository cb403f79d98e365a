import { setTimeout as sleepFor } from "node:timers/promises";
import type { PipelineConfig } from "../config.js";
import type { RunManager } from "../run_manager.js";
import {
  appendHistory,
  assertStageTransition,
  freezeCaseRecord,
  type CaseRecord,
  type FinalReport,
  type StageHistoryEntry,
  type StageName
} from "./case_record.js";
import type { Collaborators } from "./collaborators.js";
import { classifyStageError, type ErrorCategory, type FailureKind } from "./errors.js";
import { examinationStage } from "./examination_stage.js";
import { imagingStage } from "./imaging_stage.js";
import { intakeStage } from "./intake_stage.js";
import { reportStage } from "./report_stage.js";
import type { PromptMode, StageAgent, StageContext } from "./stage.js";
import { backoffDelayMs, nowIso } from "./utils.js";

export type CaseState = "created" | "intake" | "examination" | "imaging" | "report" | "completed" | "failed";

type GuardName = "always" | "imagingOrdered" | "noImagingOrdered";

export type Transition = {
  to: CaseState;
  guard: GuardName;
};

const GUARDS: Record<GuardName, (record: CaseRecord) => boolean> = {
  always: () => true,
  imagingOrdered: (record) => record.imagingOrder !== null,
  noImagingOrdered: (record) => record.imagingOrder === null
};

/**
 * Success transitions, evaluated in order once the state's stage has committed. Every
 * non-terminal state may additionally move to `failed`.
 */
export const CASE_TRANSITIONS: Readonly<Record<CaseState, readonly Transition[]>> = {
  created: [{ to: "intake", guard: "always" }],
  intake: [{ to: "examination", guard: "always" }],
  examination: [
    { to: "imaging", guard: "imagingOrdered" },
    { to: "report", guard: "noImagingOrdered" }
  ],
  imaging: [{ to: "report", guard: "always" }],
  report: [{ to: "completed", guard: "always" }],
  completed: [],
  failed: []
};

export const STATE_STAGE: Readonly<Partial<Record<CaseState, StageName>>> = {
  intake: "Intake",
  examination: "Examination",
  imaging: "Imaging",
  report: "ReportSynthesis"
};

export function nextCaseState(state: CaseState, record: CaseRecord): CaseState | null {
  const match = CASE_TRANSITIONS[state].find((t) => GUARDS[t.guard](record));
  return match ? match.to : null;
}

export type RunFailure = {
  stage: StageName | null;
  kind: FailureKind;
  category: ErrorCategory;
  message: string;
  attempts: number;
};

export type RunOutcome =
  | { ok: true; report: FinalReport; history: readonly StageHistoryEntry[]; record: CaseRecord }
  | { ok: false; failure: RunFailure; history: readonly StageHistoryEntry[]; record: CaseRecord };

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (input: { runId: string }, runs: RunManager, options: PipelineOptions) => Promise<RunOutcome>;

export type StageRegistry = Record<StageName, StageAgent>;

export const DEFAULT_STAGES: StageRegistry = {
  Intake: intakeStage,
  Examination: examinationStage,
  Imaging: imagingStage,
  ReportSynthesis: reportStage
};

export type CasePipelineDeps = {
  collaborators: Collaborators;
  config: PipelineConfig;
  stages?: Partial<StageRegistry>;
  now?: () => string;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

type StageRunResult = { ok: true; record: CaseRecord } | { ok: false; record: CaseRecord; failure: RunFailure };

async function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

/**
 * Drives one case through the state machine. Stages run strictly one at a time; each successful
 * result is validated and committed exactly once. Cancellation is honoured before every stage
 * invocation, never in the middle of one.
 */
export function createCasePipeline(deps: CasePipelineDeps): PipelineFn {
  const stages: StageRegistry = { ...DEFAULT_STAGES, ...deps.stages };
  const now = deps.now ?? nowIso;
  const sleep = deps.sleep ?? defaultSleep;
  const { config, collaborators } = deps;

  return async (input, runs, options) => {
    const { runId } = input;
    const { signal } = options;
    const initial = runs.getRecord(runId);
    if (!initial) throw new Error(`Unknown run: ${runId}`);
    const image = runs.getImage(runId);

    async function backoff(stage: StageName, attempt: number): Promise<void> {
      const delay = backoffDelayMs(attempt, config.retry.backoffBaseMs, config.retry.backoffMaxMs);
      runs.log(runId, `Retrying ${stage} in ${delay}ms`, stage);
      if (delay <= 0) return;
      try {
        await sleep(delay, signal);
      } catch (err) {
        // An aborted backoff falls through to the cancellation check of the next attempt.
        if (!signal.aborted) throw err;
      }
    }

    async function runStage(agent: StageAgent, start: CaseRecord): Promise<StageRunResult> {
      const stage = agent.name;
      const { maxAttempts } = config.retry;
      let current = start;
      let attempt = 0;
      let promptMode: PromptMode = "standard";
      let strictRetryUsed = false;

      for (;;) {
        if (signal.aborted) {
          return { ok: false, record: current, failure: { stage, kind: "Cancelled", category: "Fatal", message: "Cancelled", attempts: attempt } };
        }

        attempt += 1;
        runs.startStage(runId, stage);
        const ctx: StageContext = {
          collaborators,
          config,
          image,
          promptMode,
          log: (message) => runs.log(runId, message, stage)
        };

        try {
          const result = await agent.process(current, ctx);
          assertStageTransition(current, result.record, result.urgencyOverride);
          const entry: StageHistoryEntry = {
            stage,
            attempt,
            at: now(),
            outcome: "Success",
            knowledgeSources: result.knowledgeSources,
            ...(result.urgencyOverride ? { urgencyOverride: result.urgencyOverride } : {})
          };
          const committed = appendHistory(result.record, entry);
          runs.commitRecord(runId, committed);
          runs.finishStage(runId, stage, "done");
          return { ok: true, record: committed };
        } catch (err) {
          const classified = classifyStageError(err);
          // The strict retry sits outside the transient budget.
          const transientAttempts = strictRetryUsed ? attempt - 1 : attempt;
          const retryTransient = classified.category === "Transient" && transientAttempts < maxAttempts;
          const retryStructural = classified.category === "Structural" && !strictRetryUsed;
          const retry = retryTransient || retryStructural;

          current = appendHistory(current, {
            stage,
            attempt,
            at: now(),
            outcome: retry ? "Retried" : "Failed",
            reason: classified.message,
            errorKind: classified.kind
          });
          runs.commitRecord(runId, current);

          if (!retry) {
            runs.finishStage(runId, stage, "error", `${classified.kind}: ${classified.message}`);
            const category: ErrorCategory = classified.category === "Structural" ? "Fatal" : classified.category;
            return { ok: false, record: current, failure: { stage, ...classified, category, attempts: attempt } };
          }

          runs.finishStage(runId, stage, "retry", `${classified.kind}: ${classified.message}`);
          runs.log(runId, `${stage} attempt ${attempt} failed (${classified.category}/${classified.kind}): ${classified.message}`, stage);
          if (retryStructural) {
            strictRetryUsed = true;
            promptMode = "strict";
            runs.log(runId, `Retrying ${stage} once with a stricter output prompt`, stage);
          } else {
            await backoff(stage, attempt);
          }
        }
      }
    }

    let record = initial;
    let state: CaseState = "created";
    runs.log(runId, "Pipeline start");

    for (;;) {
      const next = nextCaseState(state, record);
      if (!next) throw new Error(`No transition from state ${state}`);
      if (state === "examination" && next === "report") {
        runs.skipStage(runId, "Imaging");
        runs.log(runId, "No imaging order; skipping Imaging", "Imaging");
      }
      state = next;
      runs.setState(runId, state);

      if (state === "completed") {
        const report = record.report;
        if (!report) throw new Error("Pipeline completed without a final report");
        const frozen = freezeCaseRecord(record);
        runs.commitRecord(runId, frozen);
        return { ok: true, report, history: frozen.history, record: frozen };
      }

      const stageName = STATE_STAGE[state];
      if (!stageName) throw new Error(`State ${state} has no stage`);
      const result = await runStage(stages[stageName], record);
      record = result.record;

      if (!result.ok) {
        runs.setState(runId, "failed");
        const frozen = freezeCaseRecord(record);
        runs.commitRecord(runId, frozen);
        return { ok: false, failure: result.failure, history: frozen.history, record: frozen };
      }
    }
  };
}
