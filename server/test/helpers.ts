import type { KnowledgeSnippet } from "../src/pipeline/case_record.js";
import type {
  Classification,
  ClassifyRequest,
  Collaborators,
  InferenceClient,
  InferenceRequest,
  KnowledgeRetriever,
  VisionClassifier
} from "../src/pipeline/collaborators.js";
import { buildConfig, type PipelineConfig, type PipelineConfigInput } from "../src/config.js";

export const FIXED_AT = "2026-01-01T00:00:00.000Z";
export const fixedClock = () => FIXED_AT;

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

export const COMPLAINT_A = "mild seasonal cough, no fever";
export const COMPLAINT_B = "persistent high fever, chest pain, shortness of breath";

export const INTAKE_LOW = {
  symptom_tags: ["cough"],
  urgency: "Low",
  department: "General Practice",
  summary: "Mild seasonal cough without fever."
};

export const EXAM_LOW = {
  hypotheses: [
    { condition: "Seasonal allergic rhinitis", confidence: 0.55, rationale: "Seasonal cough without fever [ddx-003]." },
    { condition: "Viral upper respiratory infection", confidence: 0.7, rationale: "Cough without fever, self-limiting [ddx-002]." }
  ],
  urgency: "Low"
};

export const INTAKE_HIGH = {
  symptom_tags: ["fever", "chest pain", "shortness of breath"],
  urgency: "High",
  department: "Emergency",
  summary: "Febrile patient with chest pain and dyspnoea."
};

export const EXAM_HIGH = {
  hypotheses: [
    { condition: "Pulmonary embolism", confidence: 0.2, rationale: "Dyspnoea with pleuritic pain [ddx-005]." },
    { condition: "Community-acquired pneumonia", confidence: 0.62, rationale: "Fever, chest pain and dyspnoea suggest pneumonia [ddx-001]." }
  ],
  urgency: "High"
};

export const IMAGING_OUT = {
  narrative: "Right lower lobe consolidation with air bronchograms [rad-001].",
  impression: "Findings consistent with pneumonia.",
  urgency: "High"
};

type Scripted = unknown;
type Script = Record<string, Scripted[]>;

/**
 * Inference stand-in driven by a per-schema queue. The last entry of a queue repeats forever;
 * Error entries are thrown instead of returned.
 */
export class ScriptedInference implements InferenceClient {
  readonly calls: InferenceRequest[] = [];

  constructor(private readonly script: Script) {}

  async generate(request: InferenceRequest): Promise<unknown> {
    this.calls.push(request);
    const queue = this.script[request.schema.name];
    if (!queue || queue.length === 0) throw new Error(`No scripted response for ${request.schema.name}`);
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next instanceof Error) throw next;
    return structuredClone(next);
  }

  callsFor(schemaName: string): InferenceRequest[] {
    return this.calls.filter((c) => c.schema.name === schemaName);
  }
}

export class StaticRetriever implements KnowledgeRetriever {
  readonly queries: Array<{ text: string; k: number }> = [];

  constructor(private readonly snippets: KnowledgeSnippet[]) {}

  async query(text: string, k: number): Promise<KnowledgeSnippet[]> {
    this.queries.push({ text, k });
    return this.snippets.slice(0, k).map((s) => ({ ...s }));
  }
}

export class StaticVision implements VisionClassifier {
  readonly calls: ClassifyRequest[] = [];

  constructor(private readonly result: Classification | Error) {}

  async classify(request: ClassifyRequest): Promise<Classification> {
    this.calls.push(request);
    if (this.result instanceof Error) throw this.result;
    return { ...this.result };
  }
}

export const SNIPPETS: KnowledgeSnippet[] = [
  { sourceId: "ddx-001", text: "Community-acquired pneumonia presents with fever and productive cough.", relevance: 0.42 },
  { sourceId: "rad-001", text: "Pneumonia appears as consolidation on chest X-ray.", relevance: 0.31 }
];

export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return buildConfig({ ...overrides, retry: { maxAttempts: 3, backoffBaseMs: 0, ...overrides.retry } });
}

export function makeCollaborators(parts: Partial<Collaborators> & { script?: Script } = {}): Collaborators & {
  inference: InferenceClient;
} {
  return {
    inference: parts.inference ?? new ScriptedInference(parts.script ?? {}),
    retriever: parts.retriever ?? new StaticRetriever(SNIPPETS),
    vision: parts.vision ?? new StaticVision({ label: "Pneumonia", confidence: 0.91 })
  };
}

export type Deferred<T = void> = { promise: Promise<T>; resolve: (value: T) => void; reject: (err: Error) => void };

export function deferred<T = void>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(5);
  }
  throw new Error("timeout");
}
