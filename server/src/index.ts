import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { setDefaultOpenAIKey } from "@openai/agents";
import { createApp } from "./app.js";
import { loadConfigFromEnv } from "./config.js";
import { CaseOrchestrator } from "./orchestrator.js";
import { AgentsInferenceClient } from "./pipeline/inference_client.js";
import { KnowledgeStore } from "./pipeline/knowledge_store.js";
import { HttpVisionClassifier } from "./pipeline/vision_classifier.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim().length === 0) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

const config = loadConfigFromEnv(process.env);

setDefaultOpenAIKey(requireEnv("OPENAI_API_KEY"));
const visionEndpoint = requireEnv("VISION_API_URL");

const knowledgePath = process.env.CASE_KNOWLEDGE_PATH?.trim() || path.resolve(__dirname, "../data/knowledge_base.json");
const knowledge = await KnowledgeStore.fromFile(knowledgePath, { minRelevance: config.retrieval.minRelevance });
console.log(`knowledge store: ${knowledge.size} documents from ${knowledgePath}`);

const orchestrator = new CaseOrchestrator({
  config,
  collaborators: {
    inference: new AgentsInferenceClient({ model: config.model.name }),
    retriever: knowledge,
    vision: new HttpVisionClassifier({ endpoint: visionEndpoint, token: process.env.VISION_API_TOKEN?.trim() || undefined })
  }
});

const app = createApp(orchestrator.runs, orchestrator.executor, {
  health: () => ({
    model: config.model.name,
    knowledgeDocuments: knowledge.size,
    maxConcurrentRuns: config.concurrency
  })
});

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port} (model ${config.model.name}, max ${config.concurrency} concurrent cases)`);
});
