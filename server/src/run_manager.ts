import { EventEmitter } from "node:events";
import { randomBytes } from "node:crypto";
import { createCaseRecord, type CaseRecord, type PatientInfo, type StageName } from "./pipeline/case_record.js";
import type { CaseState, RunFailure } from "./pipeline/case_pipeline.js";
import { nowIso } from "./pipeline/utils.js";

export type RunInput = {
  complaint: string;
  image?: Buffer;
  patient?: PatientInfo;
  medicalHistory?: string;
};

export type StageRecord = {
  name: StageName;
  status: "pending" | "running" | "done" | "skipped" | "error";
  attempts: number;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
};

export type RunStatus = {
  runId: string;
  status: "queued" | "running" | "completed" | "failed" | "cancelled";
  state: CaseState;
  startedAt: string;
  finishedAt?: string;
  hasImage: boolean;
  stages: Record<StageName, StageRecord>;
  record: CaseRecord;
  failure?: RunFailure;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
  image: Buffer | null;
  activeStage: StageName | null;
};

export type RunListItem = Pick<RunStatus, "runId" | "status" | "state" | "startedAt" | "finishedAt">;

const RUN_ID_SUFFIX_LEN = 10;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

const RUN_EVENTS = ["state_changed", "stage_started", "stage_finished", "record_committed", "run_finished", "log", "error"] as const;

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function stageRecords(make: (name: StageName) => StageRecord): Record<StageName, StageRecord> {
  return {
    Intake: make("Intake"),
    Examination: make("Examination"),
    Imaging: make("Imaging"),
    ReportSynthesis: make("ReportSynthesis")
  };
}

export function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}

/** In-memory store of case runs. Cases do not outlive the process. */
export class RunManager {
  private runs = new Map<string, RunInternal>();

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, status: r.status, state: r.state, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : 0));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  getImage(runId: string): Buffer | null {
    return this.runs.get(runId)?.image ?? null;
  }

  getRecord(runId: string): CaseRecord | null {
    return this.runs.get(runId)?.record ?? null;
  }

  private nextRunId(): string {
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `case-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!this.runs.has(runId)) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  createRun(input: RunInput): RunStatus {
    const runId = this.nextRunId();

    const stages = stageRecords((name) => ({ name, status: "pending", attempts: 0 }));

    const emitter = new EventEmitter();
    // Node treats "error" events specially: if nobody is listening, it throws.
    emitter.on("error", () => undefined);

    const run: RunInternal = {
      runId,
      status: "queued",
      state: "created",
      startedAt: nowIso(),
      hasImage: Boolean(input.image && input.image.length > 0),
      stages,
      record: createCaseRecord(runId, input.complaint, { patient: input.patient, medicalHistory: input.medicalHistory }),
      emitter,
      image: input.image && input.image.length > 0 ? input.image : null,
      activeStage: null
    };

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<Partial<RunStatus>, "finishedAt" | "failure">): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.failure) r.failure = patch.failure;
    if (isTerminalRunStatus(status)) {
      r.image = null;
      r.emitter.emit("run_finished", { status, failure: r.failure, at: r.finishedAt ?? nowIso() });
    }
  }

  setState(runId: string, state: CaseState): void {
    const r = this.runs.get(runId);
    if (!r) return;
    const from = r.state;
    r.state = state;
    r.emitter.emit("state_changed", { from, to: state, at: nowIso() });
  }

  /** Marks a stage active. A run never has two stages in flight. */
  startStage(runId: string, stage: StageName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    if (r.activeStage) throw new Error(`Stage ${stage} started while ${r.activeStage} is still active on ${runId}`);
    r.activeStage = stage;
    const s = r.stages[stage];
    s.status = "running";
    s.attempts += 1;
    s.startedAt = s.startedAt ?? nowIso();
    delete s.error;
    r.emitter.emit("stage_started", { stage, attempt: s.attempts, at: nowIso() });
  }

  finishStage(runId: string, stage: StageName, outcome: "done" | "retry" | "error", error?: string): void {
    const r = this.runs.get(runId);
    if (!r) return;
    if (r.activeStage === stage) r.activeStage = null;
    const s = r.stages[stage];
    const at = nowIso();
    if (outcome === "retry") {
      s.status = "pending";
    } else {
      s.status = outcome;
      s.finishedAt = at;
    }
    if (error) s.error = error;
    r.emitter.emit("stage_finished", { stage, outcome, attempt: s.attempts, at });
    if (outcome === "error" && error) r.emitter.emit("error", { stage, message: error, at });
  }

  skipStage(runId: string, stage: StageName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.stages[stage].status = "skipped";
  }

  /** Adopts a new record version. Only the pipeline calls this, once per committed result. */
  commitRecord(runId: string, record: CaseRecord): void {
    const r = this.runs.get(runId);
    if (!r) return;
    if (record.caseId !== r.record.caseId) throw new Error(`Record ${record.caseId} does not belong to run ${runId}`);
    r.record = record;
    r.emitter.emit("record_committed", { historyLength: record.history.length, at: nowIso() });
  }

  log(runId: string, message: string, stage?: StageName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, stage, at: nowIso() });
  }

  error(runId: string, message: string, stage?: StageName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, stage, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: string, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENTS.map((type) => [type, (payload: unknown) => onEvent(type, payload)] as const);
    for (const [type, handler] of handlers) r.emitter.on(type, handler);

    return () => {
      for (const [type, handler] of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, image: _image, activeStage: _activeStage, ...pub } = run;
    return { ...pub, stages: stageRecords((name) => ({ ...pub.stages[name] })) };
  }
}
