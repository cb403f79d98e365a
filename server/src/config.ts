import { z } from "zod";

const ImagingIndicationSchema = z.object({
  condition: z.string().trim().min(1),
  modality: z.string().trim().min(1),
  bodyRegion: z.string().trim().min(1)
});

export const PipelineConfigSchema = z
  .object({
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(3),
        backoffBaseMs: z.number().int().min(0).default(500),
        backoffMaxMs: z.number().int().min(0).default(8000)
      })
      .default({}),
    timeouts: z
      .object({
        retrievalMs: z.number().int().min(1).default(10_000),
        inferenceMs: z.number().int().min(1).default(60_000),
        classificationMs: z.number().int().min(1).default(30_000)
      })
      .default({}),
    retrieval: z
      .object({
        k: z.number().int().min(1).max(50).default(4),
        minRelevance: z.number().min(0).max(1).default(0.05)
      })
      .default({}),
    model: z
      .object({
        name: z.string().trim().min(1).default("gpt-4.1-mini"),
        temperature: z.number().min(0).max(2).default(0.2),
        maxTokens: z.number().int().min(64).default(1200)
      })
      .default({}),
    imaging: z
      .object({
        labels: z.array(z.string().trim().min(1)).min(2).default(["Normal", "Pneumonia"]),
        normalLabel: z.string().trim().min(1).default("Normal"),
        findingThreshold: z.number().min(0).max(1).default(0.5),
        indications: z.array(ImagingIndicationSchema).default([
          { condition: "pneumonia", modality: "X-ray", bodyRegion: "chest" },
          { condition: "pneumothorax", modality: "X-ray", bodyRegion: "chest" },
          { condition: "pleural effusion", modality: "X-ray", bodyRegion: "chest" },
          { condition: "fracture", modality: "X-ray", bodyRegion: "affected limb" }
        ])
      })
      .default({})
      .refine((img) => img.labels.includes(img.normalLabel), { message: "imaging.normalLabel must be one of imaging.labels" }),
    concurrency: z.number().int().min(1).max(32).default(2)
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type ImagingIndication = z.infer<typeof ImagingIndicationSchema>;

export function buildConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return PipelineConfigSchema.parse(input);
}

function numberVar(env: NodeJS.ProcessEnv, name: string, problems: string[]): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    problems.push(`${name} must be a number (got "${raw}")`);
    return undefined;
  }
  return n;
}

function listVar(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Builds the pipeline config from `CASE_*` environment variables. Unset variables take the
 * defaults; invalid ones are reported together.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): PipelineConfig {
  const problems: string[] = [];
  const num = (name: string) => numberVar(env, name, problems);

  const indicationConditions = listVar(env, "CASE_IMAGING_INDICATIONS");
  const input: PipelineConfigInput = {
    retry: {
      maxAttempts: num("CASE_RETRY_MAX_ATTEMPTS"),
      backoffBaseMs: num("CASE_RETRY_BACKOFF_BASE_MS"),
      backoffMaxMs: num("CASE_RETRY_BACKOFF_MAX_MS")
    },
    timeouts: {
      retrievalMs: num("CASE_RETRIEVAL_TIMEOUT_MS"),
      inferenceMs: num("CASE_INFERENCE_TIMEOUT_MS"),
      classificationMs: num("CASE_CLASSIFICATION_TIMEOUT_MS")
    },
    retrieval: {
      k: num("CASE_RETRIEVAL_K"),
      minRelevance: num("CASE_RETRIEVAL_MIN_RELEVANCE")
    },
    model: {
      name: env.CASE_MODEL?.trim() || undefined,
      temperature: num("CASE_MODEL_TEMPERATURE"),
      maxTokens: num("CASE_MODEL_MAX_TOKENS")
    },
    imaging: {
      labels: listVar(env, "CASE_IMAGING_LABELS"),
      normalLabel: env.CASE_IMAGING_NORMAL_LABEL?.trim() || undefined,
      findingThreshold: num("CASE_IMAGING_FINDING_THRESHOLD"),
      indications: indicationConditions?.map((entry) => {
        // condition[:modality[:bodyRegion]]
        const [condition, modality, bodyRegion] = entry.split(":").map((s) => s.trim());
        return { condition, modality: modality || "X-ray", bodyRegion: bodyRegion || "chest" };
      })
    },
    concurrency: num("CASE_MAX_CONCURRENT_RUNS")
  };

  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) problems.push(`${issue.path.join(".")}: ${issue.message}`);
  }
  if (problems.length > 0 || !parsed.success) {
    throw new Error(`Invalid pipeline configuration:\n- ${problems.join("\n- ")}`);
  }
  return parsed.data;
}
