import { z } from "zod";
import { InvariantViolationError, type FailureKind } from "./errors.js";

export const STAGE_ORDER = ["Intake", "Examination", "Imaging", "ReportSynthesis"] as const;
export type StageName = (typeof STAGE_ORDER)[number];

export const URGENCY_LEVELS = ["Low", "Moderate", "High", "Critical"] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export type StageOutcome = "Success" | "Retried" | "Failed";

export type KnowledgeSnippet = Readonly<{
  sourceId: string;
  text: string;
  relevance: number;
}>;

export type PatientInfo = {
  name?: string;
  patientId?: string;
  age?: number;
  gender?: string;
  ethnicity?: string;
};

export type SymptomProfile = {
  tags: readonly string[];
  complaint: string;
};

export type DiagnosisHypothesis = {
  condition: string;
  confidence: number;
  rationale: string;
};

export type ImagingOrder = {
  modality: string;
  bodyRegion: string;
  indication: string;
};

export type ImagingFinding = {
  label: string;
  confidence: number;
  narrative: string;
  impression: string;
};

export type UrgencyOverride = {
  from: UrgencyLevel;
  to: UrgencyLevel;
  reason: string;
};

export type StageHistoryEntry = {
  stage: StageName;
  attempt: number;
  at: string;
  outcome: StageOutcome;
  reason?: string;
  errorKind?: FailureKind;
  knowledgeSources?: readonly string[];
  urgencyOverride?: UrgencyOverride;
};

export type FinalReport = {
  caseId: string;
  urgency: UrgencyLevel;
  department: string | null;
  symptomProfile: SymptomProfile;
  diagnosis: readonly DiagnosisHypothesis[];
  imagingFinding: ImagingFinding | null;
  history: readonly StageHistoryEntry[];
  knowledgeSources: readonly string[];
  markdown: string;
};

export type CaseRecord = {
  caseId: string;
  complaint: string;
  patient: PatientInfo | null;
  medicalHistory: string | null;
  symptomProfile: SymptomProfile | null;
  intakeSummary: string | null;
  urgency: UrgencyLevel | null;
  department: string | null;
  diagnosis: readonly DiagnosisHypothesis[];
  imagingOrder: ImagingOrder | null;
  imagingFinding: ImagingFinding | null;
  knowledgeContext: readonly KnowledgeSnippet[];
  history: readonly StageHistoryEntry[];
  report: FinalReport | null;
};

const UrgencySchema = z.enum(URGENCY_LEVELS);

const HypothesisSchema = z.object({
  condition: z.string().min(1),
  confidence: z.number().min(0).max(1),
  rationale: z.string()
});

const SnippetSchema = z.object({
  sourceId: z.string().min(1),
  text: z.string(),
  relevance: z.number()
});

const HistoryEntrySchema = z.object({
  stage: z.enum(STAGE_ORDER),
  attempt: z.number().int().min(1),
  at: z.string().min(1),
  outcome: z.enum(["Success", "Retried", "Failed"]),
  reason: z.string().optional(),
  errorKind: z.string().optional(),
  knowledgeSources: z.array(z.string()).optional(),
  urgencyOverride: z
    .object({ from: UrgencySchema, to: UrgencySchema, reason: z.string().min(1) })
    .optional()
});

export const CaseRecordSchema = z
  .object({
    caseId: z.string().min(1),
    complaint: z.string(),
    patient: z
      .object({
        name: z.string().optional(),
        patientId: z.string().optional(),
        age: z.number().int().min(0).max(130).optional(),
        gender: z.string().optional(),
        ethnicity: z.string().optional()
      })
      .nullable(),
    medicalHistory: z.string().nullable(),
    symptomProfile: z.object({ tags: z.array(z.string().min(1)), complaint: z.string() }).nullable(),
    intakeSummary: z.string().min(1).nullable(),
    urgency: UrgencySchema.nullable(),
    department: z.string().nullable(),
    diagnosis: z.array(HypothesisSchema),
    imagingOrder: z
      .object({ modality: z.string().min(1), bodyRegion: z.string().min(1), indication: z.string().min(1) })
      .nullable(),
    imagingFinding: z
      .object({
        label: z.string().min(1),
        confidence: z.number().min(0).max(1),
        narrative: z.string(),
        impression: z.string()
      })
      .nullable(),
    knowledgeContext: z.array(SnippetSchema),
    history: z.array(HistoryEntrySchema),
    report: z.unknown().nullable()
  })
  .superRefine((rec, ctx) => {
    if (rec.imagingFinding && !rec.imagingOrder) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "imagingFinding requires imagingOrder", path: ["imagingFinding"] });
    }
    for (let i = 1; i < rec.diagnosis.length; i++) {
      if (rec.diagnosis[i].confidence > rec.diagnosis[i - 1].confidence) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "diagnosis must be sorted by descending confidence", path: ["diagnosis", i] });
        break;
      }
    }
  });

export function urgencyRank(level: UrgencyLevel): number {
  return URGENCY_LEVELS.indexOf(level);
}

export function maxUrgency(a: UrgencyLevel, b: UrgencyLevel): UrgencyLevel {
  return urgencyRank(a) >= urgencyRank(b) ? a : b;
}

export function createCaseRecord(
  caseId: string,
  complaint: string,
  options?: { patient?: PatientInfo; medicalHistory?: string }
): CaseRecord {
  return {
    caseId,
    complaint,
    patient: options?.patient ? { ...options.patient } : null,
    medicalHistory: options?.medicalHistory?.trim() ? options.medicalHistory.trim() : null,
    symptomProfile: null,
    intakeSummary: null,
    urgency: null,
    department: null,
    diagnosis: [],
    imagingOrder: null,
    imagingFinding: null,
    knowledgeContext: [],
    history: [],
    report: null
  };
}

export function updateCaseRecord(record: CaseRecord, patch: Partial<Omit<CaseRecord, "caseId" | "history">>): CaseRecord {
  return { ...record, ...patch };
}

export function appendHistory(record: CaseRecord, entry: StageHistoryEntry): CaseRecord {
  return { ...record, history: [...record.history, entry] };
}

export function sortHypotheses(hypotheses: readonly DiagnosisHypothesis[]): DiagnosisHypothesis[] {
  return [...hypotheses].sort((a, b) => b.confidence - a.confidence || a.condition.localeCompare(b.condition));
}

export function hasSuccessfulStage(record: CaseRecord, stage: StageName): boolean {
  return record.history.some((h) => h.stage === stage && h.outcome === "Success");
}

/**
 * Checks a stage's proposed record against the committed one before the orchestrator adopts it.
 * Urgency may only drop when the stage supplies an override with a reason.
 */
export function assertStageTransition(prev: CaseRecord, next: CaseRecord, override?: UrgencyOverride): void {
  const parsed = CaseRecordSchema.safeParse(next);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new InvariantViolationError(`Invalid case record: ${first?.path.join(".") ?? ""} ${first?.message ?? "unknown issue"}`.trim());
  }

  if (next.caseId !== prev.caseId) throw new InvariantViolationError("caseId changed between stages");

  if (next.history.length !== prev.history.length || next.history.some((h, i) => h !== prev.history[i])) {
    throw new InvariantViolationError("stage history may only be appended by the orchestrator");
  }

  if (prev.urgency && !next.urgency) throw new InvariantViolationError("urgency cleared by a later stage");
  if (prev.urgency && next.urgency && urgencyRank(next.urgency) < urgencyRank(prev.urgency)) {
    const valid = override && override.from === prev.urgency && override.to === next.urgency && override.reason.trim().length > 0;
    if (!valid) {
      throw new InvariantViolationError(`urgency lowered from ${prev.urgency} to ${next.urgency} without an override reason`);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function freezeCaseRecord(record: CaseRecord): CaseRecord {
  return deepFreeze(record);
}
