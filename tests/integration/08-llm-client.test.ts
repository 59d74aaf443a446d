import express from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ConfigurationError, UpstreamError } from "../../src/errors";
import { GeminiClient } from "../../src/services/llm";
import { listen, type Running } from "../helpers";

type SeenRequest = { model: string; prompt: string; auth: string | undefined };

/** Stand-in for an OpenAI-compatible chat-completions endpoint. */
function fakeModelServer(seen: SeenRequest[]) {
  const app = express();
  app.use(express.json());
  app.post("/v1/chat/completions", (req, res) => {
    const model = String(req.body.model);
    const prompt = String(req.body.messages?.[0]?.content ?? "");
    seen.push({ model, prompt, auth: req.headers.authorization });

    if (req.headers.authorization !== "Bearer test-key") {
      res.status(401).json({ error: { message: "API key not valid", type: "invalid_request_error" } });
      return;
    }
    if (model === "rate-limited") {
      res.status(429).json({ error: { message: "Quota exceeded", type: "rate_limit" } });
      return;
    }
    const content = model === "silent" ? "" : `echo: ${prompt}`;
    res.json({
      id: "chatcmpl-test",
      object: "chat.completion",
      created: 1700000000,
      model,
      choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    });
  });
  return app;
}

describe("L2 · GeminiClient", () => {
  const seen: SeenRequest[] = [];
  let server: Running;
  let baseURL: string;

  beforeAll(async () => {
    server = await listen(fakeModelServer(seen));
    baseURL = `${server.url}/v1`;
  });

  afterAll(async () => {
    await server.close();
  });

  it("returns the model text for a single call", async () => {
    const client = new GeminiClient({ apiKey: "test-key", baseURL, model: "gemini-2.5-flash" });
    seen.length = 0;

    await expect(client.generate("hi there")).resolves.toBe("echo: hi there");
    expect(seen).toEqual([{ model: "gemini-2.5-flash", prompt: "hi there", auth: "Bearer test-key" }]);
  });

  it("uses the model named by the caller", async () => {
    const client = new GeminiClient({ apiKey: "test-key", baseURL, model: "gemini-2.5-flash" });
    seen.length = 0;

    await client.generate("x", "gemini-2.5-pro");
    expect(seen[0].model).toBe("gemini-2.5-pro");
  });

  it("fails with ConfigurationError before any call when no key is set", async () => {
    const client = new GeminiClient({ baseURL, model: "gemini-2.5-flash" });
    seen.length = 0;

    await expect(client.generate("x")).rejects.toBeInstanceOf(ConfigurationError);
    expect(seen).toHaveLength(0);
  });

  it("wraps an auth failure in UpstreamError and keeps the message", async () => {
    const client = new GeminiClient({ apiKey: "wrong-key", baseURL, model: "gemini-2.5-flash" });

    await expect(client.generate("x")).rejects.toBeInstanceOf(UpstreamError);
    await expect(client.generate("x")).rejects.toThrow("Model call failed: 401 API key not valid");
  });

  it("does not retry a rate-limited call", async () => {
    const client = new GeminiClient({ apiKey: "test-key", baseURL, model: "rate-limited" });
    seen.length = 0;

    await expect(client.generate("x")).rejects.toBeInstanceOf(UpstreamError);
    expect(seen).toHaveLength(1);
  });

  it("treats an empty completion as an upstream failure", async () => {
    const client = new GeminiClient({ apiKey: "test-key", baseURL, model: "silent" });

    await expect(client.generate("x")).rejects.toThrow("Model silent returned an empty response");
  });

  it("wraps a connection failure", async () => {
    const client = new GeminiClient({
      apiKey: "test-key",
      baseURL: "http://127.0.0.1:1/v1",
      model: "gemini-2.5-flash",
    });

    await expect(client.generate("x")).rejects.toThrow(/^Model call failed: /);
  });
});
