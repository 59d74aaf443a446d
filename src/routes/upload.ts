// src/routes/upload.ts
import express, { type ErrorRequestHandler } from "express";
import { errorMessage, statusOf, userMessage } from "../errors";
import { analyzePaper } from "../services/analysis";
import { downloadUrlFor } from "../views/ResultPage";
import type { RouteDeps } from "./deps";
import { acceptPdf, readSubmission } from "./multipart";

/** POST /api/analyze: same pipeline as the form, JSON in and out. */
export function uploadRouter({ config, llm, store }: RouteDeps) {
  const router = express.Router();

  router.post("/analyze", acceptPdf(config.maxPdfMb), async (req, res, next) => {
    try {
      const input = readSubmission(req);
      const result = await analyzePaper(input, { llm, maxPages: config.maxPdfPages });
      store.saveResult(result);

      res.json({
        ok: true,
        id: result.id,
        filename: input.filename,
        bytes: input.pdf.length,
        title: result.title,
        authors: result.authors,
        model: result.model,
        sections: result.sections,
        download: downloadUrlFor(result),
      });
    } catch (err) {
      next(err);
    }
  });

  const sendError: ErrorRequestHandler = (err, _req, res, _next) => {
    console.error("[/api/analyze] error:", errorMessage(err));
    res.status(statusOf(err)).json({ ok: false, error: userMessage(err) });
  };
  router.use(sendError);

  return router;
}
