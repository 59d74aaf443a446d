// src/routes/deps.ts
import type { AppConfig } from "../config";
import type { TextGenerator } from "../services/llm";
import type { SessionStore } from "../services/session";

export type RouteDeps = {
  config: AppConfig;
  llm: TextGenerator;
  store: SessionStore;
};
