import { hasSuccessfulStage, updateCaseRecord, type CaseRecord, type FinalReport, type StageHistoryEntry } from "./case_record.js";
import { PreconditionError } from "./errors.js";
import type { StageAgent, StageContext, StageResult } from "./stage.js";

function historyLine(h: StageHistoryEntry): string {
  const parts = [`${h.at} ${h.stage} attempt ${h.attempt}: ${h.outcome}`];
  if (h.errorKind) parts.push(`(${h.errorKind})`);
  if (h.urgencyOverride) parts.push(`urgency ${h.urgencyOverride.from} -> ${h.urgencyOverride.to}: ${h.urgencyOverride.reason}`);
  return parts.join(" ");
}

export function renderReportMarkdown(report: Omit<FinalReport, "markdown">, record: CaseRecord): string {
  const lines: string[] = [];
  lines.push(`# Medical Assessment Report`, "");
  lines.push(`Case: ${report.caseId}`);
  lines.push(`Urgency: **${report.urgency}**`);
  if (report.department) lines.push(`Department: ${report.department}`);
  lines.push("", `## 1. Intake`, "", `Complaint: ${report.symptomProfile.complaint}`);
  lines.push(`Symptoms: ${report.symptomProfile.tags.join(", ") || "(none)"}`);
  if (record.intakeSummary) lines.push(`Summary: ${record.intakeSummary}`);
  if (record.medicalHistory) lines.push(`Medical history: ${record.medicalHistory}`);

  lines.push("", `## 2. Examination`, "");
  report.diagnosis.forEach((h, i) => {
    lines.push(`${i + 1}. **${h.condition}** (confidence ${h.confidence.toFixed(2)}): ${h.rationale}`);
  });

  if (report.imagingFinding) {
    const f = report.imagingFinding;
    const order = record.imagingOrder;
    lines.push("", `## 3. Imaging`, "");
    if (order) lines.push(`Study: ${order.modality} ${order.bodyRegion} (indication: ${order.indication})`);
    lines.push(`Classifier: ${f.label} (confidence ${f.confidence.toFixed(2)})`, "", f.narrative, "", `Impression: ${f.impression}`);
  }

  if (report.knowledgeSources.length > 0) {
    lines.push("", `## References`, "", ...report.knowledgeSources.map((s) => `- ${s}`));
  }

  lines.push("", `## Processing Log`, "", "```", ...report.history.map(historyLine), "```");
  return `${lines.join("\n")}\n`;
}

/** Deterministic: no inference and no retrieval, only assembly of what earlier stages committed. */
export const reportStage: StageAgent = {
  name: "ReportSynthesis",
  async process(record: CaseRecord, _ctx: StageContext): Promise<StageResult> {
    if (!hasSuccessfulStage(record, "Examination") || record.diagnosis.length === 0) {
      throw new PreconditionError("ReportSynthesis requires a completed Examination with a diagnosis");
    }
    const profile = record.symptomProfile;
    const urgency = record.urgency;
    if (!profile || !urgency) throw new PreconditionError("ReportSynthesis requires a completed Intake");

    const knowledgeSources = [...new Set(record.history.flatMap((h) => h.knowledgeSources ?? []))].sort();
    const base: Omit<FinalReport, "markdown"> = {
      caseId: record.caseId,
      urgency,
      department: record.department,
      symptomProfile: profile,
      diagnosis: record.diagnosis,
      imagingFinding: record.imagingFinding,
      history: record.history,
      knowledgeSources
    };
    const report: FinalReport = { ...base, markdown: renderReportMarkdown(base, record) };

    return {
      record: updateCaseRecord(record, { report, knowledgeContext: [] }),
      knowledgeSources: []
    };
  }
};
