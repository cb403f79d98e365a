import { maxUrgency, updateCaseRecord, type CaseRecord } from "./case_record.js";
import { INTAKE_OUTPUT, IntakeOutputSchema } from "./schemas.js";
import { formatKnowledge, formatPatient, generateStructured, retrieveKnowledge, type StageAgent, type StageContext, type StageResult } from "./stage.js";
import { assessComplaint, normalizeTags } from "./urgency_rubric.js";

export function buildIntakePrompt(record: CaseRecord, knowledge: string): string {
  return (
    `You are the hospital front desk triage nurse.\n\n` +
    `PATIENT:\n${formatPatient(record)}\n\n` +
    `COMPLAINT:\n${record.complaint}\n\n` +
    `TRIAGE REFERENCES:\n${knowledge}\n\n` +
    `Tasks:\n` +
    `- List the presenting symptoms as short lower-case tags (e.g. "cough", "chest pain").\n` +
    `- Assess urgency as one of Low, Moderate, High, Critical.\n` +
    `- Recommend the department the patient should be directed to.\n` +
    `- Summarise the presentation in one or two sentences.`
  );
}

export const intakeStage: StageAgent = {
  name: "Intake",
  async process(record: CaseRecord, ctx: StageContext): Promise<StageResult> {
    const rubric = assessComplaint(record.complaint);
    const knowledge = await retrieveKnowledge(ctx, `triage ${record.complaint}`);
    const output = await generateStructured(ctx, buildIntakePrompt(record, formatKnowledge(knowledge)), INTAKE_OUTPUT, IntakeOutputSchema);

    // The rubric is a floor: the model may escalate but never go below it.
    const urgency = maxUrgency(rubric.urgency, output.urgency);
    if (urgency !== output.urgency) ctx.log(`Rubric raised model urgency ${output.urgency} to ${urgency}`);

    return {
      record: updateCaseRecord(record, {
        symptomProfile: { tags: normalizeTags([...rubric.tags, ...output.symptom_tags]), complaint: record.complaint },
        intakeSummary: output.summary,
        urgency,
        department: output.department,
        knowledgeContext: knowledge
      }),
      knowledgeSources: knowledge.map((s) => s.sourceId)
    };
  }
};
