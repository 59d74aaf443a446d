// src/services/session.ts
import type { Request, Response } from "express";
import crypto from "node:crypto";
import type { AnalysisResult } from "../types";

/** ===== Session shape ===== */
export interface Sess {
  /** Last analysis rendered for this browser; the report download falls back to it. */
  latestAnalysisId?: string;
}

export const COOKIE_NAME = "sid";

/** Map keeps insertion order, so the first key is the oldest entry. */
function evictOldest<K, V>(map: Map<K, V>, limit: number): void {
  while (map.size > limit) {
    const oldest = map.keys().next();
    if (oldest.done) return;
    map.delete(oldest.value);
  }
}

/**
 * In-memory sessions and analysis results, both capped at `limit` entries.
 * Reports are rebuilt from what is stored here rather than from client-supplied text.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Sess>();
  private readonly results = new Map<string, AnalysisResult>();

  constructor(private readonly limit = 100) {}

  /** Reads the sid cookie or issues a new one. */
  ensureSid(req: Request, res: Response): string {
    const cookie: unknown = req.cookies?.[COOKIE_NAME];
    let sid = typeof cookie === "string" ? cookie : "";
    if (!sid) {
      sid = crypto.randomBytes(16).toString("hex");
      res.cookie(COOKIE_NAME, sid, {
        httpOnly: true,
        sameSite: "lax",
        path: "/",
        maxAge: 1000 * 60 * 60 * 24, // 1 day
      });
    }
    if (!this.sessions.has(sid)) {
      this.sessions.set(sid, {});
      evictOldest(this.sessions, this.limit);
    }
    return sid;
  }

  /** Session for the request's cookie, if it has one we know. */
  sessionOf(req: Request): Sess {
    const cookie: unknown = req.cookies?.[COOKIE_NAME];
    return (typeof cookie === "string" && this.sessions.get(cookie)) || {};
  }

  merge(sid: string, patch: Partial<Sess>): Sess {
    const next: Sess = { ...(this.sessions.get(sid) || {}), ...patch };
    this.sessions.set(sid, next);
    return next;
  }

  saveResult(result: AnalysisResult): void {
    this.results.set(result.id, result);
    evictOldest(this.results, this.limit);
  }

  getResult(id: string): AnalysisResult | undefined {
    return this.results.get(id);
  }

  /** Result named by `id`; the session's latest one when `id` is absent or already evicted. */
  resolveResult(req: Request, id?: string): AnalysisResult | undefined {
    const named = id ? this.getResult(id) : undefined;
    if (named) return named;
    const latest = this.sessionOf(req).latestAnalysisId;
    return latest ? this.getResult(latest) : undefined;
  }
}
