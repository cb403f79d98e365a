import fs from "node:fs/promises";
import { z } from "zod";
import type { KnowledgeSnippet } from "./case_record.js";
import type { KnowledgeRetriever } from "./collaborators.js";

const KnowledgeDocumentSchema = z.object({
  sourceId: z.string().trim().min(1),
  title: z.string().optional(),
  text: z.string().trim().min(1)
});

const KnowledgeCorpusSchema = z.object({
  documents: z.array(KnowledgeDocumentSchema)
});

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

export type KnowledgeStoreOptions = {
  minRelevance: number;
};

const STOPWORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "for",
  "from",
  "has",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "the",
  "to",
  "with"
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 1 && !STOPWORDS.has(t))
    .map((t) => (t.length > 4 && t.endsWith("s") && !t.endsWith("ss") ? t.slice(0, -1) : t));
}

function termCounts(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const t of tokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  return counts;
}

type IndexedDocument = {
  sourceId: string;
  text: string;
  weights: Map<string, number>;
};

/**
 * In-process TF-IDF index with cosine scoring. Documents are fixed at construction, so repeated
 * queries return identical results; equal scores are ordered by sourceId.
 */
export class KnowledgeStore implements KnowledgeRetriever {
  private readonly docs: IndexedDocument[];
  private readonly idf = new Map<string, number>();
  private readonly docCount: number;

  constructor(
    documents: readonly KnowledgeDocument[],
    private readonly options: KnowledgeStoreOptions
  ) {
    const seen = new Set<string>();
    for (const d of documents) {
      if (seen.has(d.sourceId)) throw new Error(`Duplicate knowledge sourceId: ${d.sourceId}`);
      seen.add(d.sourceId);
    }

    this.docCount = documents.length;
    const tokenized = documents.map((d) => ({ doc: d, counts: termCounts(tokenize(`${d.title ?? ""} ${d.text}`)) }));

    const df = new Map<string, number>();
    for (const { counts } of tokenized) {
      for (const term of counts.keys()) df.set(term, (df.get(term) ?? 0) + 1);
    }
    for (const [term, n] of df) this.idf.set(term, this.idfFor(n));

    this.docs = tokenized.map(({ doc, counts }) => ({
      sourceId: doc.sourceId,
      text: doc.text,
      weights: this.normalizedWeights(counts)
    }));
  }

  static async fromFile(filePath: string, options: KnowledgeStoreOptions): Promise<KnowledgeStore> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = KnowledgeCorpusSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid knowledge corpus at ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
    }
    return new KnowledgeStore(parsed.data.documents, options);
  }

  get size(): number {
    return this.docCount;
  }

  async query(text: string, k: number): Promise<KnowledgeSnippet[]> {
    if (k <= 0) return [];
    const queryWeights = this.normalizedWeights(termCounts(tokenize(text)));
    if (queryWeights.size === 0) return [];

    const scored: KnowledgeSnippet[] = [];
    for (const doc of this.docs) {
      let dot = 0;
      for (const [term, w] of queryWeights) dot += w * (doc.weights.get(term) ?? 0);
      const relevance = Math.round(dot * 1e6) / 1e6;
      if (relevance < this.options.minRelevance || relevance <= 0) continue;
      scored.push(Object.freeze({ sourceId: doc.sourceId, text: doc.text, relevance }));
    }

    scored.sort((a, b) => b.relevance - a.relevance || (a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0));
    return scored.slice(0, k);
  }

  private idfFor(documentFrequency: number): number {
    return Math.log((this.docCount + 1) / (documentFrequency + 1)) + 1;
  }

  private normalizedWeights(counts: Map<string, number>): Map<string, number> {
    const weights = new Map<string, number>();
    let norm = 0;
    for (const [term, tf] of counts) {
      const w = tf * (this.idf.get(term) ?? this.idfFor(0));
      weights.set(term, w);
      norm += w * w;
    }
    if (norm === 0) return weights;
    const len = Math.sqrt(norm);
    for (const [term, w] of weights) weights.set(term, w / len);
    return weights;
  }
}
