// src/routes/pages.ts
import express, { type ErrorRequestHandler } from "express";
import { errorMessage, statusOf, userMessage } from "../errors";
import { analyzePaper } from "../services/analysis";
import { renderIndexPage, renderResultPage } from "../views/render";
import { acceptPdf, field, readSubmission } from "./multipart";
import type { RouteDeps } from "./deps";

/** GET / form, POST / analysis rendered as HTML. */
export function pagesRouter({ config, llm, store }: RouteDeps) {
  const router = express.Router();
  const maxMb = config.maxPdfMb;

  router.get("/", (_req, res) => {
    res.type("html").send(renderIndexPage({ maxMb }));
  });

  router.post("/", acceptPdf(maxMb), async (req, res, next) => {
    try {
      const input = readSubmission(req);
      console.log("[pages] analyzing", { title: input.title, bytes: input.pdf.length });

      const result = await analyzePaper(input, { llm, maxPages: config.maxPdfPages });
      store.saveResult(result);
      store.merge(store.ensureSid(req, res), { latestAnalysisId: result.id });

      res.type("html").send(renderResultPage(result));
    } catch (err) {
      next(err);
    }
  });

  const renderError: ErrorRequestHandler = (err, req, res, _next) => {
    const status = statusOf(err);
    if (status >= 500) console.error("[pages] analysis failed:", errorMessage(err));
    else console.warn("[pages] rejected:", errorMessage(err));

    res
      .status(status)
      .type("html")
      .send(
        renderIndexPage({
          maxMb,
          error: userMessage(err),
          values: {
            title: field(req, "title"),
            authors: field(req, "authors"),
            notes: field(req, "notes"),
          },
        })
      );
  };
  router.use(renderError);

  return router;
}
