export type InferenceErrorKind = "Timeout" | "RateLimited" | "MalformedOutput" | "Unavailable";
export type RetrievalErrorKind = "Timeout" | "Unavailable";
export type ClassifierErrorKind = "Timeout" | "Unavailable" | "UnsupportedFormat";

export type FailureKind =
  | InferenceErrorKind
  | ClassifierErrorKind
  | "Precondition"
  | "InvariantViolation"
  | "Cancelled"
  | "Internal";

export type ErrorCategory = "Transient" | "Structural" | "Precondition" | "Fatal";

export class InferenceError extends Error {
  readonly kind: InferenceErrorKind;
  constructor(kind: InferenceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InferenceError";
    this.kind = kind;
  }
}

export class RetrievalError extends Error {
  readonly kind: RetrievalErrorKind;
  constructor(kind: RetrievalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
    this.kind = kind;
  }
}

export class ClassifierError extends Error {
  readonly kind: ClassifierErrorKind;
  constructor(kind: ClassifierErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClassifierError";
    this.kind = kind;
  }
}

/** A stage was invoked on a record that is not ready for it. Always an orchestration bug. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** A stage returned a record that breaks a case invariant (lowered urgency, rewritten history...). */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export type ClassifiedError = {
  category: ErrorCategory;
  kind: FailureKind;
  message: string;
};

const TRANSIENT_KINDS = new Set<FailureKind>(["Timeout", "RateLimited", "Unavailable"]);

function categoryForKind(kind: FailureKind): ErrorCategory {
  if (TRANSIENT_KINDS.has(kind)) return "Transient";
  if (kind === "MalformedOutput") return "Structural";
  if (kind === "Precondition") return "Precondition";
  return "Fatal";
}

export function classifyStageError(err: unknown): ClassifiedError {
  const message = err instanceof Error ? err.message : String(err);
  let kind: FailureKind = "Internal";
  if (err instanceof InferenceError || err instanceof RetrievalError || err instanceof ClassifierError) kind = err.kind;
  else if (err instanceof PreconditionError) kind = "Precondition";
  else if (err instanceof InvariantViolationError) kind = "InvariantViolation";
  return { category: categoryForKind(kind), kind, message };
}
