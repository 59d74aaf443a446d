import { describe, expect, it } from "vitest";
import type { Request } from "express";
import { DEFAULT_MODEL, GEMINI_OPENAI_BASE_URL, loadConfig } from "../../src/config";
import { SessionStore } from "../../src/services/session";
import { mapSections } from "../../src/services/sections";
import type { AnalysisResult } from "../../src/types";

describe("L1 · loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3333);
    expect(config.llm).toEqual({
      apiKey: undefined,
      baseURL: GEMINI_OPENAI_BASE_URL,
      model: DEFAULT_MODEL,
    });
    expect(config.maxPdfMb).toBe(20);
    expect(config.maxPdfPages).toBe(5);
    expect(config.resultStoreLimit).toBe(100);
  });

  it("reads and trims values from the environment", () => {
    const config = loadConfig({
      GEMINI_API_KEY: "  test-key  ",
      GEMINI_MODEL: "gemini-2.5-pro",
      MAX_PDF_MB: "8",
      MAX_PDF_PAGES: "3",
      PORT: "8080",
    });
    expect(config.llm.apiKey).toBe("test-key");
    expect(config.llm.model).toBe("gemini-2.5-pro");
    expect(config.maxPdfMb).toBe(8);
    expect(config.maxPdfPages).toBe(3);
    expect(config.port).toBe(8080);
  });

  it("ignores unparseable or non-positive numbers", () => {
    const config = loadConfig({ MAX_PDF_MB: "lots", MAX_PDF_PAGES: "0", GEMINI_API_KEY: "   " });
    expect(config.maxPdfMb).toBe(20);
    expect(config.maxPdfPages).toBe(5);
    expect(config.llm.apiKey).toBeUndefined();
  });
});

function result(id: string): AnalysisResult {
  return {
    id,
    title: `Paper ${id}`,
    authors: "",
    notes: "",
    model: "fake-flash",
    createdAt: new Date(),
    sections: mapSections(() => id),
    formatted: mapSections(() => `<p>${id}</p>`),
  };
}

function requestWithSid(sid?: string): Request {
  const req = Object.create(null);
  req.cookies = sid ? { sid } : {};
  return req;
}

describe("L1 · SessionStore", () => {
  it("evicts the oldest results past the limit", () => {
    const store = new SessionStore(2);
    store.saveResult(result("a"));
    store.saveResult(result("b"));
    store.saveResult(result("c"));

    expect(store.getResult("a")).toBeUndefined();
    expect(store.getResult("b")?.title).toBe("Paper b");
    expect(store.getResult("c")?.title).toBe("Paper c");
  });

  it("resolves an explicit id before the session's latest result", () => {
    const store = new SessionStore();
    store.saveResult(result("a"));
    store.saveResult(result("b"));
    store.merge("sid-1", { latestAnalysisId: "b" });

    expect(store.resolveResult(requestWithSid("sid-1"), "a")?.id).toBe("a");
    expect(store.resolveResult(requestWithSid("sid-1"))?.id).toBe("b");
  });

  it("falls back to the session's latest result when the named one was evicted", () => {
    const store = new SessionStore(1);
    store.saveResult(result("a"));
    store.saveResult(result("b"));
    store.merge("sid-1", { latestAnalysisId: "b" });

    expect(store.resolveResult(requestWithSid("sid-1"), "a")?.id).toBe("b");
    expect(store.resolveResult(requestWithSid(), "a")).toBeUndefined();
  });

  it("finds nothing for an unknown session or id", () => {
    const store = new SessionStore();
    store.saveResult(result("a"));

    expect(store.resolveResult(requestWithSid())).toBeUndefined();
    expect(store.resolveResult(requestWithSid("nobody"))).toBeUndefined();
    expect(store.resolveResult(requestWithSid(), "missing")).toBeUndefined();
  });
});
