import { z } from "zod";
import { URGENCY_LEVELS } from "./case_record.js";
import { InferenceError } from "./errors.js";

const UrgencySchema = z.enum(URGENCY_LEVELS);

export const IntakeOutputSchema = z.object({
  symptom_tags: z.array(z.string().trim().min(1)).min(1),
  urgency: UrgencySchema,
  department: z.string().trim().min(1),
  summary: z.string().trim().min(1)
});

export const ExaminationOutputSchema = z.object({
  hypotheses: z
    .array(
      z.object({
        condition: z.string().trim().min(1),
        confidence: z.number().min(0).max(1),
        rationale: z.string().trim().min(1)
      })
    )
    .min(1),
  urgency: UrgencySchema,
  urgency_override_reason: z.string().trim().optional()
});

export const ImagingOutputSchema = z.object({
  narrative: z.string().trim().min(1),
  impression: z.string().trim().min(1),
  urgency: UrgencySchema,
  urgency_override_reason: z.string().trim().optional()
});

export type OutputSchemaDescriptor = {
  name: string;
  shape: string;
};

export const INTAKE_OUTPUT: OutputSchemaDescriptor = {
  name: "intake_assessment",
  shape:
    '{"symptom_tags": ["..."], "urgency": "Low|Moderate|High|Critical", "department": "...", "summary": "..."}'
};

export const EXAMINATION_OUTPUT: OutputSchemaDescriptor = {
  name: "examination_assessment",
  shape:
    '{"hypotheses": [{"condition": "...", "confidence": 0.0, "rationale": "..."}], ' +
    '"urgency": "Low|Moderate|High|Critical", "urgency_override_reason": "(optional) ..."}'
};

export const IMAGING_OUTPUT: OutputSchemaDescriptor = {
  name: "imaging_report",
  shape:
    '{"narrative": "...", "impression": "...", "urgency": "Low|Moderate|High|Critical", "urgency_override_reason": "(optional) ..."}'
};

/** Validates raw model output against a stage schema; any mismatch is a MalformedOutput. */
export function parseStageOutput<T>(schema: z.ZodType<T>, raw: unknown, schemaName: string): T {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  throw new InferenceError("MalformedOutput", `Output failed ${schemaName} validation: ${issues}`);
}
