import { afterEach, describe, expect, test, vi } from "vitest";

import { createLogger } from "../src/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  test("drops messages below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ level: "info" });

    logger.debug("hidden");
    logger.info("shown");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[info] shown");
  });

  test("routes warnings to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger();

    logger.warn("careful");

    expect(error).toHaveBeenCalledWith("[warn] careful");
  });

  test("merges child context with metadata", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ context: { command: "motd" } });

    logger.child({ file: "post.md" }).info("rendered", { lines: 3 });

    expect(log).toHaveBeenCalledWith(
      '[info] rendered {"command":"motd","file":"post.md","lines":3}'
    );
  });

  test("stderrOnly keeps stdout free", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: "debug", stderrOnly: true });

    logger.debug("trace me");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[debug] trace me");
  });

  test("silent logger writes nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger({ silent: true }).error("boom");

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
