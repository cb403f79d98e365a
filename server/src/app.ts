import express from "express";
import cors from "cors";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";

export type HealthInfo = {
  model: string;
  knowledgeDocuments: number;
  maxConcurrentRuns: number;
};

export type AppOptions = {
  health?: () => HealthInfo;
  /** Upper bound for a decoded image attachment. */
  maxImageBytes?: number;
};

const DEFAULT_MAX_IMAGE_BYTES = 8 * 1024 * 1024;

const PatientSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    patientId: z.string().trim().min(1).max(100).optional(),
    age: z.number().int().min(0).max(130).optional(),
    gender: z.string().trim().min(1).max(50).optional(),
    ethnicity: z.string().trim().min(1).max(100).optional()
  })
  .strict();

const CreateRunBodySchema = z
  .object({
    complaint: z.string().trim().min(3).max(4000),
    image: z
      .string()
      .trim()
      .min(1)
      .regex(/^[A-Za-z0-9+/=\s]+$/, "image must be base64")
      .optional(),
    patient: PatientSchema.optional(),
    medicalHistory: z.string().trim().max(20_000).optional()
  })
  .strict();

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions = {}) {
  const app = express();
  const maxImageBytes = options.maxImageBytes ?? DEFAULT_MAX_IMAGE_BYTES;
  app.use(cors());
  // base64 inflates by 4/3; leave headroom for the rest of the body.
  app.use(express.json({ limit: Math.ceil(maxImageBytes * 1.4) + 64 * 1024 }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, ...(options.health?.() ?? {}) });
  });

  app.post("/api/runs", (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { complaint, patient, medicalHistory } = parsed.data;
    let image: Buffer | undefined;
    if (parsed.data.image) {
      image = Buffer.from(parsed.data.image.replace(/\s+/g, ""), "base64");
      if (image.length === 0) {
        res.status(400).json({ error: "image decoded to zero bytes" });
        return;
      }
      if (image.length > maxImageBytes) {
        res.status(413).json({ error: `image exceeds ${maxImageBytes} bytes` });
        return;
      }
    }

    const run = runs.createRun({ complaint, image, patient, medicalHistory });
    res.status(201).json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/report", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const report = run.record.report;
    if (run.status !== "completed" || !report) {
      res.status(409).json({ error: `report not available (run ${run.status})`, failure: run.failure ?? null });
      return;
    }
    res.setHeader("Content-Type", "text/markdown; charset=utf-8");
    res.send(report.markdown);
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("state_changed", { to: run.state, status: run.status });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.append(`${JSON.stringify(run, null, 2)}\n`, { name: "case.json" });
    archive.append(`${JSON.stringify(run.record.history, null, 2)}\n`, { name: "history.json" });
    if (run.record.report) archive.append(run.record.report.markdown, { name: "report.md" });
    archive.finalize().catch((err: unknown) => {
      runs.error(runId, `zip finalize failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  });

  return app;
}
