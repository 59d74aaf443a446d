// src/routes/download.ts
import express, { type Request } from "express";
import { NotFoundError } from "../errors";
import { toPlainText } from "../services/format";
import { NOT_PROVIDED } from "../services/prompt";
import { buildReport, reportFilename } from "../services/report";
import { SECTIONS, mapSections, type SectionMap } from "../services/sections";
import type { RouteDeps } from "./deps";

function sectionsFromQuery(query: Request["query"]): SectionMap {
  return mapSections((name) => {
    const value = query[name];
    const text = typeof value === "string" ? toPlainText(value) : "";
    return text || NOT_PROVIDED;
  });
}

function hasSectionParams(query: Request["query"]): boolean {
  return SECTIONS.some((name) => typeof query[name] === "string");
}

/**
 * GET /download_pdf/:title
 * Prefers the stored result (?id= or the session's latest); query parameters keyed by
 * section name are only used when nothing is stored. Neither available is a 404.
 */
export function downloadRouter({ store }: Pick<RouteDeps, "store">) {
  const router = express.Router();

  router.get("/download_pdf/:title", async (req, res, next) => {
    try {
      const title = req.params.title;
      const id = typeof req.query.id === "string" ? req.query.id : undefined;
      const stored = store.resolveResult(req, id);

      if (!stored && !hasSectionParams(req.query)) {
        console.warn("[download] nothing to build", { title, id });
        throw new NotFoundError(
          "This analysis is no longer available. Please upload the paper again."
        );
      }

      const sections = stored
        ? mapSections((name) => toPlainText(stored.sections[name]))
        : sectionsFromQuery(req.query);
      const reportTitle = stored ? stored.title : title;
      console.log("[download] report", { title: reportTitle, source: stored ? "stored" : "query" });

      const bytes = await buildReport({ title: reportTitle, generatedAt: new Date(), sections });

      res.attachment(reportFilename(reportTitle));
      res.type("application/pdf");
      res.send(Buffer.from(bytes));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
