import {
  sortHypotheses,
  updateCaseRecord,
  type CaseRecord,
  type DiagnosisHypothesis,
  type ImagingOrder
} from "./case_record.js";
import { withTimeout, type Classification } from "./collaborators.js";
import { ClassifierError, PreconditionError } from "./errors.js";
import { IMAGING_OUTPUT, ImagingOutputSchema } from "./schemas.js";
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
import { detectImageFormat, type ImageFormat } from "./vision_classifier.js";

/** Adds or strengthens the hypothesis an abnormal imaging label supports. */
export function reconcileDiagnosis(
  diagnosis: readonly DiagnosisHypothesis[],
  finding: Classification,
  order: ImagingOrder
): DiagnosisHypothesis[] {
  const label = finding.label.toLowerCase();
  const note = `${order.modality} ${order.bodyRegion} classifier: ${finding.label} (confidence ${finding.confidence.toFixed(2)}).`;
  const idx = diagnosis.findIndex((h) => h.condition.toLowerCase().includes(label));
  if (idx === -1) {
    return sortHypotheses([...diagnosis, { condition: finding.label, confidence: finding.confidence, rationale: `Imaging finding. ${note}` }]);
  }
  const existing = diagnosis[idx];
  const updated: DiagnosisHypothesis = {
    condition: existing.condition,
    confidence: Math.max(existing.confidence, finding.confidence),
    rationale: `${existing.rationale} Supported by imaging: ${note}`
  };
  return sortHypotheses(diagnosis.map((h, i) => (i === idx ? updated : h)));
}

export function buildImagingPrompt(record: CaseRecord, order: ImagingOrder, finding: Classification, format: ImageFormat, knowledge: string): string {
  return (
    `You are a radiologist reporting on a ${order.modality} of the ${order.bodyRegion}.\n\n` +
    `PATIENT:\n${formatPatient(record)}\n\n` +
    `CLINICAL HISTORY:\n${record.complaint}\n` +
    `Leading hypothesis: ${record.diagnosis[0]?.condition ?? "none"}\n` +
    `Imaging indication: ${order.indication}\n\n` +
    `AUTOMATED CLASSIFICATION (${format.toUpperCase()} image):\n` +
    `label=${finding.label} confidence=${finding.confidence.toFixed(2)}\n\n` +
    `IMAGING REFERENCES:\n${knowledge}\n\n` +
    `Tasks:\n` +
    `- Write the findings narrative, grounded in the references (cite ids).\n` +
    `- Give a one-sentence impression.\n` +
    `- Reassess urgency. If it should be LOWER than ${record.urgency ?? "the current level"}, explain why in urgency_override_reason.`
  );
}

export const imagingStage: StageAgent = {
  name: "Imaging",
  async process(record: CaseRecord, ctx: StageContext): Promise<StageResult> {
    const order = record.imagingOrder;
    if (!order) throw new PreconditionError("Imaging requires an imaging order from Examination");
    const image = ctx.image;
    if (!image) throw new PreconditionError("Imaging requires an attached image");
    const current = record.urgency;
    if (!current) throw new PreconditionError("Imaging requires a triage urgency");

    const [knowledge, format] = await Promise.all([
      retrieveKnowledge(ctx, `${order.modality} ${order.bodyRegion} ${order.indication} radiology findings`),
      Promise.resolve().then(() => detectImageFormat(image))
    ]);

    const { labels, normalLabel, findingThreshold } = ctx.config.imaging;
    const ms = ctx.config.timeouts.classificationMs;
    const finding = await withTimeout(
      ctx.collaborators.vision.classify({ image, labels }),
      ms,
      () => new ClassifierError("Timeout", `Image classification exceeded ${ms}ms`)
    );
    if (!labels.includes(finding.label) || !(finding.confidence >= 0 && finding.confidence <= 1)) {
      throw new ClassifierError("Unavailable", `Classifier answered outside its contract: ${finding.label} ${finding.confidence}`);
    }

    const output = await generateStructured(
      ctx,
      buildImagingPrompt(record, order, finding, format, formatKnowledge(knowledge)),
      IMAGING_OUTPUT,
      ImagingOutputSchema
    );

    const abnormal = finding.label !== normalLabel && finding.confidence >= findingThreshold;
    const diagnosis = abnormal ? reconcileDiagnosis(record.diagnosis, finding, order) : [...record.diagnosis];
    const { urgency, override } = mergeUrgency(current, output.urgency, output.urgency_override_reason);

    return {
      record: updateCaseRecord(record, {
        imagingFinding: { label: finding.label, confidence: finding.confidence, narrative: output.narrative, impression: output.impression },
        diagnosis,
        urgency,
        knowledgeContext: knowledge
      }),
      knowledgeSources: knowledge.map((s) => s.sourceId),
      urgencyOverride: override
    };
  }
};
