// src/config.ts
import type { LlmConfig } from "./services/llm";

export const GEMINI_OPENAI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";
export const DEFAULT_MODEL = "gemini-2.5-flash";

export interface AppConfig {
  port: number;
  env: string;
  /** Origin allowed to call the JSON API from a browser. */
  frontendUrl: string;
  llm: LlmConfig;
  maxPdfMb: number;
  maxPdfPages: number;
  resultStoreLimit: number;
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw !== undefined && raw.trim() !== "" && Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.GEMINI_API_KEY?.trim();
  return {
    port: positiveNumber(env.PORT, 3333),
    env: env.NODE_ENV || "development",
    frontendUrl: env.FRONTEND_URL || "http://localhost:3333",
    llm: {
      apiKey: apiKey || undefined,
      baseURL: env.GEMINI_BASE_URL || GEMINI_OPENAI_BASE_URL,
      model: env.GEMINI_MODEL || DEFAULT_MODEL,
    },
    maxPdfMb: positiveNumber(env.MAX_PDF_MB, 20),
    maxPdfPages: Math.max(1, Math.floor(positiveNumber(env.MAX_PDF_PAGES, 5))),
    resultStoreLimit: Math.max(1, Math.floor(positiveNumber(env.RESULT_STORE_LIMIT, 100))),
  };
}
