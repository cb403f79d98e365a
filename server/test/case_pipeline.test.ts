import { describe, expect, it, vi } from "vitest";
import { RunManager } from "../src/run_manager.js";
import { createCaseRecord, updateCaseRecord, type CaseRecord } from "../src/pipeline/case_record.js";
import { createCasePipeline, nextCaseState, type CasePipelineDeps } from "../src/pipeline/case_pipeline.js";
import type { Collaborators, InferenceClient, KnowledgeRetriever } from "../src/pipeline/collaborators.js";
import { InferenceError } from "../src/pipeline/errors.js";
import type { StageAgent } from "../src/pipeline/stage.js";
import {
  COMPLAINT_A,
  COMPLAINT_B,
  deferred,
  EXAM_HIGH,
  EXAM_LOW,
  fixedClock,
  IMAGING_OUT,
  INTAKE_HIGH,
  INTAKE_LOW,
  makeCollaborators,
  PNG_BYTES,
  ScriptedInference,
  StaticVision,
  testConfig,
  waitFor
} from "./helpers.js";

type RunOptions = Omit<Partial<CasePipelineDeps>, "collaborators"> & { image?: Buffer; signal?: AbortSignal };

async function runCase(collaborators: Collaborators, complaint: string, options: RunOptions = {}) {
  const runs = new RunManager();
  const run = runs.createRun({ complaint, image: options.image });
  const pipeline = createCasePipeline({
    collaborators,
    config: options.config ?? testConfig(),
    stages: options.stages,
    sleep: options.sleep,
    now: fixedClock
  });
  const outcome = await pipeline({ runId: run.runId }, runs, { signal: options.signal ?? new AbortController().signal });
  return { runs, runId: run.runId, outcome };
}

function trail(record: CaseRecord): string[] {
  return record.history.map((h) => `${h.stage}#${h.attempt}:${h.outcome}${h.errorKind ? `(${h.errorKind})` : ""}`);
}

const SCENARIO_A = { intake_assessment: [INTAKE_LOW], examination_assessment: [EXAM_LOW] };
const SCENARIO_B = { intake_assessment: [INTAKE_HIGH], examination_assessment: [EXAM_HIGH], imaging_report: [IMAGING_OUT] };

describe("case state machine", () => {
  it("branches on the imaging order after examination", () => {
    const rec = createCaseRecord("case-1", "x");
    expect(nextCaseState("created", rec)).toBe("intake");
    expect(nextCaseState("intake", rec)).toBe("examination");
    expect(nextCaseState("examination", rec)).toBe("report");
    expect(nextCaseState("examination", updateCaseRecord(rec, { imagingOrder: { modality: "X-ray", bodyRegion: "chest", indication: "pneumonia" } }))).toBe(
      "imaging"
    );
    expect(nextCaseState("imaging", rec)).toBe("report");
    expect(nextCaseState("report", rec)).toBe("completed");
    expect(nextCaseState("completed", rec)).toBeNull();
    expect(nextCaseState("failed", rec)).toBeNull();
  });
});

describe("case pipeline", () => {
  it("completes a low-acuity case without imaging", async () => {
    const vision = new StaticVision({ label: "Pneumonia", confidence: 0.91 });
    const { runs, runId, outcome } = await runCase(makeCollaborators({ vision, script: SCENARIO_A }), COMPLAINT_A);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(trail(outcome.record)).toEqual(["Intake#1:Success", "Examination#1:Success", "ReportSynthesis#1:Success"]);
    expect(outcome.history).toBe(outcome.record.history);
    expect(outcome.report.urgency).toBe("Low");
    expect(outcome.report.imagingFinding).toBeNull();
    expect(outcome.record.imagingOrder).toBeNull();
    expect(vision.calls).toHaveLength(0);
    expect(Object.isFrozen(outcome.record)).toBe(true);

    const status = runs.getRun(runId);
    expect(status?.state).toBe("completed");
    expect(status?.stages.Imaging.status).toBe("skipped");
    expect(status?.stages.ReportSynthesis.status).toBe("done");
    expect(status?.record).toBe(outcome.record);
  });

  it("runs imaging for an indicated case and folds the finding into the diagnosis", async () => {
    const { outcome } = await runCase(makeCollaborators({ script: SCENARIO_B }), COMPLAINT_B, { image: PNG_BYTES });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(trail(outcome.record)).toEqual(["Intake#1:Success", "Examination#1:Success", "Imaging#1:Success", "ReportSynthesis#1:Success"]);
    expect(outcome.report.urgency).toBe("Critical");
    expect(outcome.report.diagnosis[0]).toMatchObject({ condition: "Community-acquired pneumonia", confidence: 0.91 });
    expect(outcome.report.imagingFinding).toMatchObject({ label: "Pneumonia", confidence: 0.91 });
    expect(outcome.report.knowledgeSources).toEqual(["ddx-001", "rad-001"]);
    expect(outcome.report.markdown.split("\n")).toContain("Study: X-ray chest (indication: pneumonia)");
  });

  it("retries transient failures with exponential backoff", async () => {
    const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => undefined);
    const timeout = new InferenceError("Timeout", "Inference exceeded 10ms");
    const { runs, runId, outcome } = await runCase(
      makeCollaborators({ script: { ...SCENARIO_A, intake_assessment: [timeout, timeout, INTAKE_LOW] } }),
      COMPLAINT_A,
      { config: testConfig({ retry: { backoffBaseMs: 100 } }), sleep }
    );

    expect(outcome.ok).toBe(true);
    expect(trail(outcome.record)).toEqual([
      "Intake#1:Retried(Timeout)",
      "Intake#2:Retried(Timeout)",
      "Intake#3:Success",
      "Examination#1:Success",
      "ReportSynthesis#1:Success"
    ]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(runs.getRun(runId)?.stages.Intake.attempts).toBe(3);
  });

  it("fails after the retry budget is spent", async () => {
    const inference = new ScriptedInference({ intake_assessment: [new InferenceError("RateLimited", "429 Too Many Requests")] });
    const { runs, runId, outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({
      stage: "Intake",
      kind: "RateLimited",
      category: "Transient",
      message: "429 Too Many Requests",
      attempts: 3
    });
    expect(trail(outcome.record)).toEqual(["Intake#1:Retried(RateLimited)", "Intake#2:Retried(RateLimited)", "Intake#3:Failed(RateLimited)"]);
    expect(inference.calls).toHaveLength(3);
    expect(Object.isFrozen(outcome.record)).toBe(true);
    expect(runs.getRun(runId)?.state).toBe("failed");
    expect(runs.getRun(runId)?.stages.Intake.status).toBe("error");
  });

  it("retries malformed output once with a strict prompt", async () => {
    const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => undefined);
    const inference = new ScriptedInference({ ...SCENARIO_A, examination_assessment: [{ hypotheses: [], urgency: "Low" }, EXAM_LOW] });
    const { outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A, {
      config: testConfig({ retry: { backoffBaseMs: 100 } }),
      sleep
    });

    expect(outcome.ok).toBe(true);
    expect(trail(outcome.record)).toEqual([
      "Intake#1:Success",
      "Examination#1:Retried(MalformedOutput)",
      "Examination#2:Success",
      "ReportSynthesis#1:Success"
    ]);
    const [first, second] = inference.callsFor("examination_assessment");
    expect(first.params.temperature).toBe(0.2);
    expect(second.params.temperature).toBe(0);
    expect(second.prompt).toContain("Your previous response failed JSON/schema validation.");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("fails when the strict retry is also malformed", async () => {
    const inference = new ScriptedInference({ ...SCENARIO_A, examination_assessment: [{ hypotheses: "none" }] });
    const { outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toMatchObject({ stage: "Examination", kind: "MalformedOutput", category: "Fatal", attempts: 2 });
    expect(trail(outcome.record)).toEqual(["Intake#1:Success", "Examination#1:Retried(MalformedOutput)", "Examination#2:Failed(MalformedOutput)"]);
    expect(inference.callsFor("examination_assessment")).toHaveLength(2);
  });

  it("keeps the strict retry after transient retries used up the budget", async () => {
    const timeout = new InferenceError("Timeout", "Inference exceeded 10ms");
    const inference = new ScriptedInference({ ...SCENARIO_A, intake_assessment: [timeout, timeout, { bogus: 1 }, INTAKE_LOW] });
    const { outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A);

    expect(outcome.ok).toBe(true);
    expect(trail(outcome.record)).toEqual([
      "Intake#1:Retried(Timeout)",
      "Intake#2:Retried(Timeout)",
      "Intake#3:Retried(MalformedOutput)",
      "Intake#4:Success",
      "Examination#1:Success",
      "ReportSynthesis#1:Success"
    ]);
    expect(inference.callsFor("intake_assessment").map((c) => c.params.temperature)).toEqual([0.2, 0.2, 0.2, 0]);
  });

  it("retries malformed output even with a single-attempt budget", async () => {
    const inference = new ScriptedInference({ ...SCENARIO_A, intake_assessment: [{ bogus: 1 }, INTAKE_LOW] });
    const { outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A, {
      config: testConfig({ retry: { maxAttempts: 1 } })
    });

    expect(outcome.ok).toBe(true);
    expect(trail(outcome.record)).toEqual([
      "Intake#1:Retried(MalformedOutput)",
      "Intake#2:Success",
      "Examination#1:Success",
      "ReportSynthesis#1:Success"
    ]);
  });

  it("does not retry a transient failure of the strict attempt past a single-attempt budget", async () => {
    const timeout = new InferenceError("Timeout", "Inference exceeded 10ms");
    const inference = new ScriptedInference({ ...SCENARIO_A, intake_assessment: [{ bogus: 1 }, timeout] });
    const { outcome } = await runCase(makeCollaborators({ inference }), COMPLAINT_A, {
      config: testConfig({ retry: { maxAttempts: 1 } })
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({ stage: "Intake", kind: "Timeout", category: "Transient", message: "Inference exceeded 10ms", attempts: 2 });
    expect(trail(outcome.record)).toEqual(["Intake#1:Retried(MalformedOutput)", "Intake#2:Failed(Timeout)"]);
  });

  it("fails imaging without retrying when no image was supplied", async () => {
    const vision = new StaticVision({ label: "Pneumonia", confidence: 0.91 });
    const { outcome } = await runCase(makeCollaborators({ vision, script: SCENARIO_B }), COMPLAINT_B);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({
      stage: "Imaging",
      kind: "Precondition",
      category: "Precondition",
      message: "Imaging requires an attached image",
      attempts: 1
    });
    expect(trail(outcome.record)).toEqual(["Intake#1:Success", "Examination#1:Success", "Imaging#1:Failed(Precondition)"]);
    expect(vision.calls).toHaveLength(0);
  });

  it("records an urgency override on the stage that made it", async () => {
    const reason = "Pain reproduced on palpation of the chest wall.";
    const script = {
      intake_assessment: [{ ...INTAKE_LOW, urgency: "Moderate" }],
      examination_assessment: [{ ...EXAM_LOW, urgency: "Low", urgency_override_reason: reason }]
    };
    const { outcome } = await runCase(makeCollaborators({ script }), "chest pain after lifting boxes");

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.history[0]).not.toHaveProperty("urgencyOverride");
    expect(outcome.history[1].urgencyOverride).toEqual({ from: "High", to: "Low", reason });
    expect(outcome.report.urgency).toBe("Low");
    expect(outcome.report.markdown.split("\n")).toContain(
      `2026-01-01T00:00:00.000Z Examination attempt 1: Success urgency High -> Low: ${reason}`
    );
  });

  it("rejects a stage result that lowers urgency silently", async () => {
    const silentDowngrade: StageAgent = {
      name: "Examination",
      async process(record) {
        return {
          record: updateCaseRecord(record, { urgency: "Low", diagnosis: [{ condition: "Anxiety", confidence: 0.5, rationale: "-" }] }),
          knowledgeSources: []
        };
      }
    };
    const { outcome } = await runCase(makeCollaborators({ script: SCENARIO_B }), COMPLAINT_B, { stages: { Examination: silentDowngrade } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toMatchObject({ stage: "Examination", kind: "InvariantViolation", category: "Fatal", attempts: 1 });
    expect(outcome.record.urgency).toBe("Critical");
  });

  it("retries a retrieval that outlives its timeout", async () => {
    const hanging: KnowledgeRetriever = { query: () => new Promise(() => undefined) };
    const { outcome } = await runCase(makeCollaborators({ retriever: hanging, script: SCENARIO_A }), COMPLAINT_A, {
      config: testConfig({ timeouts: { retrievalMs: 20 } })
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({
      stage: "Intake",
      kind: "Timeout",
      category: "Transient",
      message: "Knowledge retrieval exceeded 20ms",
      attempts: 3
    });
  });

  it("stops at the next stage boundary once cancelled", async () => {
    const gate = deferred();
    const calls: string[] = [];
    const inference: InferenceClient = {
      async generate(request) {
        calls.push(request.schema.name);
        await gate.promise;
        return INTAKE_LOW;
      }
    };
    const controller = new AbortController();
    const pending = runCase(makeCollaborators({ inference }), COMPLAINT_A, { signal: controller.signal });

    await waitFor(() => calls.length === 1);
    controller.abort();
    gate.resolve();
    const { runs, runId, outcome } = await pending;

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({ stage: "Examination", kind: "Cancelled", category: "Fatal", message: "Cancelled", attempts: 0 });
    expect(trail(outcome.record)).toEqual(["Intake#1:Success"]);
    expect(calls).toEqual(["intake_assessment"]);
    expect(runs.getRun(runId)?.stages.Examination.attempts).toBe(0);
  });

  it("cancels during a backoff sleep without waiting it out", async () => {
    const timeout = new InferenceError("Timeout", "Inference exceeded 10ms");
    const runs = new RunManager();
    const run = runs.createRun({ complaint: COMPLAINT_A });
    const pipeline = createCasePipeline({
      collaborators: makeCollaborators({ script: { ...SCENARIO_A, intake_assessment: [timeout, INTAKE_LOW] } }),
      config: testConfig({ retry: { backoffBaseMs: 60_000, backoffMaxMs: 60_000 } }),
      now: fixedClock
    });
    const controller = new AbortController();
    const started = Date.now();
    const pending = pipeline({ runId: run.runId }, runs, { signal: controller.signal });

    await waitFor(() => runs.getRecord(run.runId)?.history.length === 1);
    controller.abort();
    const outcome = await pending;

    expect(Date.now() - started).toBeLessThan(2000);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({ stage: "Intake", kind: "Cancelled", category: "Fatal", message: "Cancelled", attempts: 1 });
    expect(trail(outcome.record)).toEqual(["Intake#1:Retried(Timeout)"]);
    expect(runs.getRun(run.runId)?.state).toBe("failed");
  });
});
