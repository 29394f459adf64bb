import { describe, test, expect, vi, afterEach } from "vitest";
import { ConsoleLogger } from "../../src/logger";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should default to warn level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ timestamps: false });

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[MMPay] WARN: shown");
  });

  test("should append structured data as JSON", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ timestamps: false, prefix: "[Test]" });

    logger.error("failed", { code: "api_error", statusCode: 500 });

    expect(error).toHaveBeenCalledWith(
      '[Test] ERROR: failed {"code":"api_error","statusCode":500}',
    );
  });

  test("should prefix an ISO timestamp by default", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: "info" });

    logger.info("hello");

    expect(info.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[MMPay\] INFO: hello$/,
    );
  });

  test("should emit nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.setLevel("silent");
    logger.error("quiet");

    expect(error).not.toHaveBeenCalled();
  });
});
