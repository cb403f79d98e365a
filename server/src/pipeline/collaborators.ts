import type { KnowledgeSnippet } from "./case_record.js";
import type { OutputSchemaDescriptor } from "./schemas.js";

export type ModelParams = {
  temperature: number;
  maxTokens: number;
};

export type InferenceRequest = {
  prompt: string;
  schema: OutputSchemaDescriptor;
  params: ModelParams;
};

/**
 * Text-generation capability. Resolves with the parsed JSON value the model produced, or rejects
 * with an `InferenceError`. Conformance to `schema` is checked by the caller, not here.
 */
export interface InferenceClient {
  generate(request: InferenceRequest): Promise<unknown>;
}

/** Rejects with a `RetrievalError`. An empty array is a valid answer. */
export interface KnowledgeRetriever {
  query(text: string, k: number): Promise<KnowledgeSnippet[]>;
}

export type ClassifyRequest = {
  image: Buffer;
  labels: readonly string[];
};

export type Classification = {
  label: string;
  confidence: number;
};

/** Rejects with a `ClassifierError`. */
export interface VisionClassifier {
  classify(request: ClassifyRequest): Promise<Classification>;
}

export type Collaborators = {
  inference: InferenceClient;
  retriever: KnowledgeRetriever;
  vision: VisionClassifier;
};

/**
 * Bounds a collaborator call. The underlying call is not aborted; its late result is dropped.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
