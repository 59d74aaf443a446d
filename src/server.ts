// src/server.ts
import { config as loadEnv } from "dotenv";
loadEnv({ override: true });

import { createApp } from "./app";
import { loadConfig } from "./config";
import { GeminiClient } from "./services/llm";

// ===================== CONFIG =====================
const config = loadConfig();
if (!config.llm.apiKey) {
  console.warn("[ENV] GEMINI_API_KEY is not set; analyses will fail until it is.");
}

// ===================== APP =====================
const app = createApp({ config, llm: new GeminiClient(config.llm) });

export default app;

// ===================== START (skipped when a serverless host imports the app) =====================
if (!process.env.VERCEL) {
  app.listen(config.port, () => {
    console.log(`✅ Paper Breakdown running at http://localhost:${config.port}`);
    console.log(`Model: ${config.llm.model} · uploads up to ${config.maxPdfMb} MB`);
  });
}
