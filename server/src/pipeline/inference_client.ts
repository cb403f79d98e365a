import { Agent, MaxTurnsExceededError, ModelBehaviorError, Runner } from "@openai/agents";
import type { InferenceClient, InferenceRequest } from "./collaborators.js";
import { InferenceError } from "./errors.js";

const INSTRUCTIONS = `You are a clinical decision-support assistant inside a hospital case pipeline.

Rules:
- Answer ONLY with a single JSON object (no markdown fences, no commentary).
- Use exactly the keys of the output shape you are given; no extra top-level keys.
- Ground clinical statements in the reference snippets when they are provided.
- Confidence values are numbers between 0 and 1.`;

/** Extracts the JSON object from model text, tolerating a surrounding markdown fence. */
export function parseModelJson(text: string): unknown {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;
  try {
    return JSON.parse(body);
  } catch {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start !== -1 && end > start) {
      try {
        return JSON.parse(body.slice(start, end + 1));
      } catch {
        // fall through to the MalformedOutput below
      }
    }
    throw new InferenceError("MalformedOutput", "Model output is not valid JSON");
  }
}

function statusOf(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return null;
}

/** Maps SDK / HTTP failures onto the inference error taxonomy. */
export function toInferenceError(err: unknown): InferenceError {
  if (err instanceof InferenceError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
    return new InferenceError("MalformedOutput", msg, { cause: err });
  }
  const status = statusOf(err);
  if (status === 429) return new InferenceError("RateLimited", msg, { cause: err });
  if (status === 408 || (err instanceof Error && /timed? ?out/i.test(`${err.name} ${msg}`))) {
    return new InferenceError("Timeout", msg, { cause: err });
  }
  return new InferenceError("Unavailable", msg, { cause: err });
}

export type AgentsInferenceClientOptions = {
  model: string;
  runner?: Runner;
};

/**
 * InferenceClient over the OpenAI Agents SDK. The agent is schema-less; the requested output
 * shape travels in the prompt and the caller validates what comes back.
 */
export class AgentsInferenceClient implements InferenceClient {
  private readonly runner: Runner;

  constructor(private readonly options: AgentsInferenceClientOptions) {
    this.runner = options.runner ?? new Runner();
  }

  async generate(request: InferenceRequest): Promise<unknown> {
    const agent = new Agent({
      name: request.schema.name,
      model: this.options.model,
      modelSettings: { temperature: request.params.temperature, maxTokens: request.params.maxTokens },
      instructions: INSTRUCTIONS
    });

    const input = `${request.prompt}\n\nOutput shape (${request.schema.name}):\n${request.schema.shape}`;

    let text: string | undefined;
    try {
      const result = await this.runner.run(agent, input, { maxTurns: 2 });
      text = result.finalOutput;
    } catch (err) {
      throw toInferenceError(err);
    }

    if (!text || text.trim().length === 0) throw new InferenceError("MalformedOutput", "Model produced no final output");
    return parseModelJson(text);
  }
}
