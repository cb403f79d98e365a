import type { ImagingIndication } from "../config.js";
import { sortHypotheses, updateCaseRecord, type CaseRecord, type DiagnosisHypothesis, type ImagingOrder } from "./case_record.js";
import { PreconditionError } from "./errors.js";
import { EXAMINATION_OUTPUT, ExaminationOutputSchema } from "./schemas.js";
import {
  formatKnowledge,
  formatPatient,
  generateStructured,
  mergeUrgency,
  retrieveKnowledge,
  type StageAgent,
  type StageContext,
  type StageResult
} from "./stage.js";

function mentions(text: string, condition: string): boolean {
  const escaped = condition.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`\\b${escaped}\\b`).test(text.toLowerCase());
}

/**
 * Orders imaging only when the leading hypothesis names or argues for a condition on the
 * configured imaging-indicated list. The first matching list entry decides the order.
 */
export function imagingOrderFor(top: DiagnosisHypothesis | undefined, indications: readonly ImagingIndication[]): ImagingOrder | null {
  if (!top) return null;
  const text = `${top.condition} ${top.rationale}`;
  const hit = indications.find((ind) => mentions(text, ind.condition));
  if (!hit) return null;
  return { modality: hit.modality, bodyRegion: hit.bodyRegion, indication: hit.condition };
}

export function buildExaminationPrompt(record: CaseRecord, knowledge: string): string {
  return (
    `You are an experienced physician examining a patient after triage.\n\n` +
    `PATIENT:\n${formatPatient(record)}\n\n` +
    `COMPLAINT:\n${record.complaint}\n\n` +
    `SYMPTOM TAGS: ${record.symptomProfile?.tags.join(", ") ?? ""}\n` +
    `TRIAGE URGENCY: ${record.urgency ?? "unknown"}\n\n` +
    `MEDICAL HISTORY:\n${record.medicalHistory ?? "(none provided)"}\n\n` +
    `DIFFERENTIAL DIAGNOSIS REFERENCES:\n${knowledge}\n\n` +
    `Tasks:\n` +
    `- Give a differential diagnosis: each hypothesis with a confidence in [0,1] and a rationale citing the references by id.\n` +
    `- Reassess urgency. If you believe urgency should be LOWER than the triage urgency, explain why in urgency_override_reason.`
  );
}

export const examinationStage: StageAgent = {
  name: "Examination",
  async process(record: CaseRecord, ctx: StageContext): Promise<StageResult> {
    const profile = record.symptomProfile;
    const current = record.urgency;
    if (!profile || !current) throw new PreconditionError("Examination requires a completed Intake (symptom profile and urgency)");

    const knowledge = await retrieveKnowledge(ctx, `differential diagnosis ${profile.tags.join(" ")} ${record.complaint}`);
    const output = await generateStructured(
      ctx,
      buildExaminationPrompt(record, formatKnowledge(knowledge)),
      EXAMINATION_OUTPUT,
      ExaminationOutputSchema
    );

    const diagnosis = sortHypotheses(output.hypotheses);
    const imagingOrder = imagingOrderFor(diagnosis[0], ctx.config.imaging.indications);
    const { urgency, override } = mergeUrgency(current, output.urgency, output.urgency_override_reason);
    if (imagingOrder) ctx.log(`Imaging ordered: ${imagingOrder.modality} ${imagingOrder.bodyRegion} for ${imagingOrder.indication}`);

    return {
      record: updateCaseRecord(record, { diagnosis, imagingOrder, urgency, knowledgeContext: knowledge }),
      knowledgeSources: knowledge.map((s) => s.sourceId),
      urgencyOverride: override
    };
  }
};
