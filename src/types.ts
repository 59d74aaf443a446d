// src/types.ts
import type { SectionMap } from "./services/sections";

/** One form submission, before anything touches the disk. */
export type AnalysisInput = {
  title: string;
  authors: string;
  notes: string;
  pdf: Buffer;
  filename: string;
};

export type AnalysisResult = {
  id: string;
  title: string;
  authors: string;
  notes: string;
  model: string;
  createdAt: Date;
  /** Section text as split from the model reply. */
  sections: SectionMap;
  /** The same sections rendered to HTML for the results page. */
  formatted: SectionMap;
};
