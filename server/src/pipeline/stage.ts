import type { z } from "zod";
import type { PipelineConfig } from "../config.js";
import type { CaseRecord, KnowledgeSnippet, StageName, UrgencyLevel, UrgencyOverride } from "./case_record.js";
import { maxUrgency, urgencyRank } from "./case_record.js";
import { withTimeout, type Collaborators } from "./collaborators.js";
import { InferenceError, RetrievalError } from "./errors.js";
import { parseStageOutput, type OutputSchemaDescriptor } from "./schemas.js";

export type PromptMode = "standard" | "strict";

export type StageContext = {
  collaborators: Collaborators;
  config: PipelineConfig;
  image: Buffer | null;
  promptMode: PromptMode;
  log: (message: string) => void;
};

export type StageResult = {
  record: CaseRecord;
  knowledgeSources: string[];
  urgencyOverride?: UrgencyOverride;
};

/**
 * One clinical processing step. `process` must not mutate its input and must depend only on the
 * record, the context and what the collaborators return, so a retried attempt is a replay.
 */
export interface StageAgent {
  readonly name: StageName;
  process(record: CaseRecord, ctx: StageContext): Promise<StageResult>;
}

const STRICT_SUFFIX =
  `Your previous response failed JSON/schema validation.\n` +
  `Rules:\n` +
  `- Return ONLY JSON (no markdown fences)\n` +
  `- Include every required key, with values of the required type and range\n` +
  `- Do not add extra top-level keys`;

export async function retrieveKnowledge(ctx: StageContext, query: string): Promise<KnowledgeSnippet[]> {
  const { retriever } = ctx.collaborators;
  const { k } = ctx.config.retrieval;
  const ms = ctx.config.timeouts.retrievalMs;
  return await withTimeout(retriever.query(query, k), ms, () => new RetrievalError("Timeout", `Knowledge retrieval exceeded ${ms}ms`));
}

export async function generateStructured<T>(
  ctx: StageContext,
  prompt: string,
  descriptor: OutputSchemaDescriptor,
  schema: z.ZodType<T>
): Promise<T> {
  const { temperature, maxTokens } = ctx.config.model;
  const ms = ctx.config.timeouts.inferenceMs;
  const strict = ctx.promptMode === "strict";
  const fullPrompt = strict ? `${prompt}\n\n${STRICT_SUFFIX}` : prompt;

  const raw = await withTimeout(
    ctx.collaborators.inference.generate({
      prompt: fullPrompt,
      schema: descriptor,
      params: { temperature: strict ? 0 : temperature, maxTokens }
    }),
    ms,
    () => new InferenceError("Timeout", `Inference exceeded ${ms}ms`)
  );
  return parseStageOutput(schema, raw, descriptor.name);
}

export function formatKnowledge(snippets: readonly KnowledgeSnippet[]): string {
  if (snippets.length === 0) return "(no reference snippets retrieved)";
  return snippets.map((s) => `[${s.sourceId}] (relevance ${s.relevance.toFixed(2)}) ${s.text}`).join("\n");
}

export function formatPatient(record: CaseRecord): string {
  const p = record.patient;
  if (!p) return "(not provided)";
  const parts = [
    p.name ? `Name: ${p.name}` : null,
    p.patientId ? `ID: ${p.patientId}` : null,
    typeof p.age === "number" ? `Age: ${p.age}` : null,
    p.gender ? `Gender: ${p.gender}` : null,
    p.ethnicity ? `Ethnicity: ${p.ethnicity}` : null
  ].filter((x): x is string => x !== null);
  return parts.length > 0 ? parts.join("\n") : "(not provided)";
}

/**
 * Folds a stage's proposed urgency into the current one. A lower proposal is only taken when the
 * model gave a reason, and is then reported as an override for the history entry.
 */
export function mergeUrgency(
  current: UrgencyLevel,
  proposed: UrgencyLevel,
  overrideReason: string | undefined
): { urgency: UrgencyLevel; override?: UrgencyOverride } {
  if (urgencyRank(proposed) >= urgencyRank(current)) return { urgency: maxUrgency(current, proposed) };
  const reason = overrideReason?.trim();
  if (!reason) return { urgency: current };
  return { urgency: proposed, override: { from: current, to: proposed, reason } };
}
