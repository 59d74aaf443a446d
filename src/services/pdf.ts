// src/services/pdf.ts

/**
 * Text extraction for uploaded papers, using pdf-parse.
 * Never throws: a failed or empty extraction comes back as a sentinel string so the
 * rest of the pipeline still runs on whatever the user typed into the form.
 */

import fs from "node:fs/promises";
import type { Options, Result } from "pdf-parse";
import { errorMessage } from "../errors";

type PdfParse = (data: Buffer, options?: Options) => Promise<Result>;

/* eslint-disable @typescript-eslint/no-var-requires */
// The lib entry skips the self-test pdf-parse runs when its index is not require()d.
const pdfParse: PdfParse = require("pdf-parse/lib/pdf-parse.js");
/* eslint-enable @typescript-eslint/no-var-requires */

export const DEFAULT_MAX_PAGES = 5;
export const NO_TEXT_EXTRACTED = "⚠ No text extracted from PDF";
const FAILURE_PREFIX = "⚠ PDF text extraction failed: ";

export function isExtractionSentinel(text: string): boolean {
  return text === NO_TEXT_EXTRACTED || text.startsWith(FAILURE_PREFIX);
}

/** Header check so non-PDFs fail with a readable reason instead of a pdf.js stack. */
function looksLikePDF(buf: Buffer | Uint8Array): boolean {
  return (
    buf.length >= 5 &&
    String.fromCharCode(buf[0], buf[1], buf[2], buf[3], buf[4]) === "%PDF-"
  );
}

/** Text of the first `maxPages` pages of the PDF at `path`, one page after another. */
export async function extractPdfText(
  path: string,
  maxPages = DEFAULT_MAX_PAGES
): Promise<string> {
  try {
    const buf = await fs.readFile(path);
    if (!looksLikePDF(buf)) {
      throw new Error("file does not start with a PDF header");
    }
    const { text, numpages } = await pdfParse(buf, { max: maxPages });
    const trimmed = (text ?? "").trim();
    if (!trimmed) {
      console.warn("[pdf] no text on the first pages", { numpages, maxPages });
      return NO_TEXT_EXTRACTED;
    }
    console.log("[pdf] extracted", { numpages, maxPages, chars: trimmed.length });
    return trimmed;
  } catch (e) {
    const msg = errorMessage(e);
    console.warn("[pdf] extraction failed:", msg);
    return `${FAILURE_PREFIX}${msg}`;
  }
}
