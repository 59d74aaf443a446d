// src/routes/multipart.ts
import type { Request, RequestHandler } from "express";
import multer from "multer";
import { ValidationError } from "../errors";
import type { AnalysisInput } from "../types";

export const FILE_FIELD = "pdf_file";

/** multer memory storage for the single `pdf_file` field, capped at `maxMb`. */
export function acceptPdf(maxMb: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: Math.floor(maxMb * 1024 * 1024) },
  }).single(FILE_FIELD);

  return (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
          return next(
            new ValidationError(`File too large. The maximum upload size is ${maxMb} MB.`, 413)
          );
        }
        return next(new ValidationError(`Upload rejected: ${err.message}.`));
      }
      return next(err);
    });
  };
}

/** Trimmed text field from a multipart or urlencoded body; "" when absent. */
export function field(req: Request, name: string): string {
  const value: unknown = req.body?.[name];
  return typeof value === "string" ? value.trim() : "";
}

function isPdf(file: Express.Multer.File): boolean {
  return (
    file.mimetype === "application/pdf" || file.originalname.toLowerCase().endsWith(".pdf")
  );
}

/** Validates the upload and the title before any processing starts. */
export function readSubmission(req: Request): AnalysisInput {
  const file = req.file;
  if (!file || !file.originalname || file.size === 0) {
    throw new ValidationError("Please attach a PDF file.");
  }
  if (!isPdf(file)) {
    throw new ValidationError("The uploaded file must be a PDF.");
  }
  const title = field(req, "title");
  if (!title) {
    throw new ValidationError("Please enter the paper title.");
  }
  return {
    title,
    authors: field(req, "authors"),
    notes: field(req, "notes"),
    pdf: file.buffer,
    filename: file.originalname,
  };
}
