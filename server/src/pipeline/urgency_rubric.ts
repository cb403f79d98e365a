import type { UrgencyLevel } from "./case_record.js";
import { maxUrgency } from "./case_record.js";

type RubricEntry = {
  term: string;
  urgency: UrgencyLevel;
};

const RUBRIC: readonly RubricEntry[] = [
  { term: "unresponsive", urgency: "Critical" },
  { term: "unconscious", urgency: "Critical" },
  { term: "not breathing", urgency: "Critical" },
  { term: "cardiac arrest", urgency: "Critical" },
  { term: "anaphylaxis", urgency: "Critical" },
  { term: "seizure", urgency: "Critical" },
  { term: "severe bleeding", urgency: "Critical" },
  { term: "chest pain", urgency: "High" },
  { term: "shortness of breath", urgency: "High" },
  { term: "difficulty breathing", urgency: "High" },
  { term: "high fever", urgency: "High" },
  { term: "coughing blood", urgency: "High" },
  { term: "confusion", urgency: "High" },
  { term: "fainting", urgency: "High" },
  { term: "severe headache", urgency: "High" },
  { term: "fever", urgency: "Moderate" },
  { term: "vomiting", urgency: "Moderate" },
  { term: "wheezing", urgency: "Moderate" },
  { term: "dizziness", urgency: "Moderate" },
  { term: "abdominal pain", urgency: "Moderate" },
  { term: "rash", urgency: "Moderate" },
  { term: "cough", urgency: "Low" },
  { term: "sore throat", urgency: "Low" },
  { term: "runny nose", urgency: "Low" },
  { term: "congestion", urgency: "Low" },
  { term: "headache", urgency: "Low" },
  { term: "fatigue", urgency: "Low" }
];

// Three or more independent high-acuity findings together are treated as critical.
const HIGH_FLAGS_FOR_CRITICAL = 3;

const NEGATION = /\b(no|not|denies|denied|without|negative for)\b/;

export type RubricResult = {
  urgency: UrgencyLevel;
  tags: string[];
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function clauses(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[,.;!?\n]|\bbut\b/)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Keyword/severity rubric for complaint text. Terms preceded by a negation in the same clause
 * ("no fever") do not count, and a term contained in a longer matched term ("fever" inside
 * "high fever") is only counted once.
 */
export function assessComplaint(complaint: string): RubricResult {
  const matched = new Map<string, UrgencyLevel>();

  for (const clause of clauses(complaint)) {
    const hits: RubricEntry[] = [];
    for (const entry of RUBRIC) {
      const m = new RegExp(`\\b${escapeRegExp(entry.term)}\\b`).exec(clause);
      if (!m) continue;
      if (NEGATION.test(clause.slice(0, m.index))) continue;
      hits.push(entry);
    }
    for (const hit of hits) {
      const shadowed = hits.some((other) => other !== hit && other.term.includes(hit.term));
      if (!shadowed) matched.set(hit.term, hit.urgency);
    }
  }

  let urgency: UrgencyLevel = "Low";
  let highFlags = 0;
  for (const level of matched.values()) {
    urgency = maxUrgency(urgency, level);
    if (level === "High") highFlags += 1;
  }
  if (highFlags >= HIGH_FLAGS_FOR_CRITICAL) urgency = "Critical";

  return { urgency, tags: [...matched.keys()].sort() };
}

export function normalizeTags(tags: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const t of tags) {
    const norm = t.trim().toLowerCase().replace(/\s+/g, " ");
    if (norm.length > 0) out.add(norm);
  }
  return [...out].sort();
}
