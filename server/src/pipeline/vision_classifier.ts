import { z } from "zod";
import type { Classification, ClassifyRequest, VisionClassifier } from "./collaborators.js";
import { ClassifierError } from "./errors.js";

export type ImageFormat = "png" | "jpeg" | "dicom";

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function startsWith(bytes: Buffer, magic: number[], offset = 0): boolean {
  if (bytes.length < offset + magic.length) return false;
  return magic.every((b, i) => bytes[offset + i] === b);
}

/** Identifies the image container from its magic bytes; anything unrecognised is UnsupportedFormat. */
export function detectImageFormat(bytes: Buffer): ImageFormat {
  if (startsWith(bytes, PNG_MAGIC)) return "png";
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return "jpeg";
  // DICOM Part 10: 128-byte preamble followed by "DICM".
  if (startsWith(bytes, [0x44, 0x49, 0x43, 0x4d], 128)) return "dicom";
  throw new ClassifierError("UnsupportedFormat", `Unsupported image format (${bytes.length} bytes, unrecognised header)`);
}

const ScoresSchema = z
  .array(
    z.object({
      label: z.string().min(1),
      score: z.number().min(0).max(1)
    })
  )
  .min(1);

/** Picks the highest-scoring prediction that maps onto the expected label set (case-insensitive). */
export function pickExpectedLabel(scores: Array<{ label: string; score: number }>, labels: readonly string[]): Classification {
  const byLower = new Map(labels.map((l) => [l.toLowerCase(), l]));
  let best: Classification | null = null;
  for (const s of scores) {
    const label = byLower.get(s.label.trim().toLowerCase());
    if (!label) continue;
    if (!best || s.score > best.confidence) best = { label, confidence: s.score };
  }
  if (!best) {
    throw new ClassifierError("Unavailable", `Classifier returned no label from the expected set [${labels.join(", ")}]`);
  }
  return best;
}

export type HttpVisionClassifierOptions = {
  endpoint: string;
  token?: string;
  fetchImpl?: typeof fetch;
};

/**
 * Image-classification endpoint that accepts raw image bytes and answers `[{ label, score }]`
 * (the shape served by hosted ViT chest X-ray classifiers).
 */
export class HttpVisionClassifier implements VisionClassifier {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpVisionClassifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async classify(request: ClassifyRequest): Promise<Classification> {
    const headers: Record<string, string> = { "Content-Type": "application/octet-stream" };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(this.options.endpoint, { method: "POST", headers, body: request.image });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ClassifierError("Unavailable", `Vision endpoint unreachable: ${msg}`, { cause: err });
    }

    if (res.status === 415) throw new ClassifierError("UnsupportedFormat", "Vision endpoint rejected the image format");
    if (!res.ok) throw new ClassifierError("Unavailable", `Vision endpoint answered HTTP ${res.status}`);

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new ClassifierError("Unavailable", "Vision endpoint returned non-JSON body", { cause: err });
    }

    // Some endpoints wrap a single image's predictions in an outer array.
    const candidate = Array.isArray(body) && body.length === 1 && Array.isArray(body[0]) ? body[0] : body;
    const parsed = ScoresSchema.safeParse(candidate);
    if (!parsed.success) throw new ClassifierError("Unavailable", "Vision endpoint returned an unexpected payload");

    return pickExpectedLabel(parsed.data, request.labels);
  }
}
