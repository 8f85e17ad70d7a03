import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, formatDuration } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes scoped lines to stderr and drops debug by default", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("kube-explorer");

    logger.debug("hidden");
    logger.info("ready");
    logger.warn("slow");

    expect(spy.mock.calls).toEqual([["[kube-explorer] ready"], ["[kube-explorer] Warning: slow"]]);
  });

  it("keeps debug lines in debug mode and passes errors along", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("scan", { debug: true });
    const failure = new Error("boom");

    logger.debug("details");
    logger.error("failed", failure);

    expect(spy.mock.calls).toEqual([["[scan] [DEBUG] details"], ["[scan] Error: failed", failure]]);
  });
});

describe("formatDuration", () => {
  it("picks the largest sensible unit", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(5000)).toBe("5s");
    expect(formatDuration(120_000)).toBe("2m");
    expect(formatDuration(90_000)).toBe("1m30s");
  });
});
