import { describe, it, expect } from "vitest";
import { MockUpstream, sseFrames } from "./mock-upstream.js";

async function readAll(response: Response): Promise<string> {
  return response.text();
}

describe("MockUpstream", () => {
  it("encodes payloads as SSE frames", () => {
    expect(sseFrames([{ a: 1 }])).toEqual(['data: {"a":1}\n\n', "data: [DONE]\n\n"]);
    expect(sseFrames([{ a: 1 }], { done: false })).toEqual(['data: {"a":1}\n\n']);
  });

  it("records requests and serves scripted chunks", async () => {
    const upstream = new MockUpstream().enqueue({ chunks: ["one ", "two"] });
    const response = await upstream.fetch("https://api.example.test/chat", {
      method: "POST",
      headers: { Authorization: "Bearer test-secret" },
      body: JSON.stringify({ hello: "world" }),
    });

    expect(response.status).toBe(200);
    expect(await readAll(response)).toBe("one two");
    expect(upstream.requests).toEqual([
      {
        url: "https://api.example.test/chat",
        method: "POST",
        headers: { authorization: "Bearer test-secret" },
        body: { hello: "world" },
      },
    ]);
  });

  it("serves JSON bodies with their status", async () => {
    const upstream = new MockUpstream().enqueue({ status: 429, json: { error: { message: "slow down" } } });
    const response = await upstream.fetch("https://api.example.test/chat");
    expect(response.status).toBe(429);
    expect(await response.json()).toEqual({ error: { message: "slow down" } });
  });

  it("rejects with the scripted network error", async () => {
    const upstream = new MockUpstream().enqueue({ networkError: new Error("ECONNREFUSED") });
    await expect(upstream.fetch("https://api.example.test/chat")).rejects.toThrow("ECONNREFUSED");
  });

  it("errors a hanging body when the request is aborted", async () => {
    const upstream = new MockUpstream().enqueue({ chunks: ["first"], hang: true });
    const controller = new AbortController();
    const response = await upstream.fetch("https://api.example.test/chat", { signal: controller.signal });
    const body = response.body;
    if (!body) throw new Error("expected a body");
    const reader = body.getReader();

    const first = await reader.read();
    expect(new TextDecoder().decode(first.value)).toBe("first");

    const pending = reader.read();
    controller.abort();
    await expect(pending).rejects.toThrow("aborted");
    expect(upstream.abortCount).toBe(1);
  });
});
