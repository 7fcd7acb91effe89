// Tests for debug tracing

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTracer, isEnabled, matchPattern } from "./logging.ts";

describe("matchPattern", () => {
  it("matches exact namespaces", () => {
    expect(matchPattern("weft:streams", "weft:streams")).toBe(true);
    expect(matchPattern("weft:streams", "weft:stream")).toBe(false);
  });

  it("supports wildcards", () => {
    expect(matchPattern("anything:here", "*")).toBe(true);
    expect(matchPattern("weft:streams", "weft:*")).toBe(true);
    expect(matchPattern("other:streams", "weft:*")).toBe(false);
  });

  it("treats regex characters literally", () => {
    expect(matchPattern("weft.streams", "weft.streams")).toBe(true);
    expect(matchPattern("weftXstreams", "weft.streams")).toBe(false);
  });
});

describe("isEnabled", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("is disabled when DEBUG is empty", () => {
    vi.stubEnv("DEBUG", "");
    expect(isEnabled("weft:streams")).toBe(false);
  });

  it("accepts comma and space separated lists", () => {
    vi.stubEnv("DEBUG", "other:*, weft:streams");
    expect(isEnabled("weft:streams")).toBe(true);
    expect(isEnabled("weft:frames")).toBe(false);
  });

  it("supports exclusion patterns", () => {
    vi.stubEnv("DEBUG", "*,-weft:streams");
    expect(isEnabled("weft:streams")).toBe(false);
    expect(isEnabled("weft:frames")).toBe(true);
  });

  it("lets later patterns re-enable", () => {
    vi.stubEnv("DEBUG", "-weft:streams weft:*");
    expect(isEnabled("weft:streams")).toBe(true);
  });
});

describe("createTracer", () => {
  let logs: Array<{ message: string; data: unknown }> = [];

  beforeEach(() => {
    logs = [];
    vi.spyOn(console, "log").mockImplementation((message: string, data?: unknown) => {
      logs.push({ message, data });
    });
    vi.stubEnv("DEBUG", "weft:*");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("logs structured events", () => {
    const trace = createTracer("weft:test");
    trace("open", { networkId: 1 });

    expect(logs).toEqual([{ message: "weft:test open", data: { type: "open", networkId: 1 } }]);
  });

  it("logs events without fields", () => {
    createTracer("weft:test")("ping");
    expect(logs).toEqual([{ message: "weft:test ping", data: { type: "ping" } }]);
  });

  it("checks DEBUG on every call", () => {
    const trace = createTracer("weft:test");
    vi.stubEnv("DEBUG", "");
    trace("quiet");
    vi.stubEnv("DEBUG", "weft:test");
    trace("loud");

    expect(logs.map((entry) => entry.message)).toEqual(["weft:test loud"]);
  });
});
