// src/services/analysis.ts
import crypto from "node:crypto";
import type { AnalysisInput, AnalysisResult } from "../types";
import { formatSection } from "./format";
import type { TextGenerator } from "./llm";
import { extractPdfText, isExtractionSentinel } from "./pdf";
import { buildPrompt } from "./prompt";
import { mapSections, splitSections } from "./sections";
import { withTempFile } from "./tempfile";

export type AnalysisDeps = {
  llm: TextGenerator;
  maxPages: number;
  model?: string;
};

/**
 * Upload → extract → prompt → model → split → format.
 * Extraction never fails the run; the model call and the split can.
 */
export async function analyzePaper(
  input: AnalysisInput,
  deps: AnalysisDeps
): Promise<AnalysisResult> {
  const model = deps.model || deps.llm.defaultModel;

  const extracted = await withTempFile(input.pdf, (filePath) =>
    extractPdfText(filePath, deps.maxPages)
  );
  console.log("[analyze] extracted", {
    file: input.filename,
    chars: extracted.length,
    sentinel: isExtractionSentinel(extracted),
  });

  const prompt = buildPrompt({
    title: input.title,
    authors: input.authors,
    abstract: extracted,
    notes: input.notes,
  });

  const raw = await deps.llm.generate(prompt, model);
  console.log("[analyze] model replied", { model, chars: raw.length });

  const sections = splitSections(raw);
  const formatted = mapSections((name) => formatSection(sections[name]));

  return {
    id: crypto.randomUUID(),
    title: input.title,
    authors: input.authors,
    notes: input.notes,
    model,
    createdAt: new Date(),
    sections,
    formatted,
  };
}
