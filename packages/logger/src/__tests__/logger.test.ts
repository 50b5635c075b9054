import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  createChildLogger,
  createLogger,
  createLoggerFactory,
  getBatchId,
  runWithBatchId,
} from "../index.js";

/**
 * Collects every JSON line pino writes
 */
function createCapture() {
  const lines: Record<string, unknown>[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      for (const line of String(chunk).split("\n")) {
        if (line.trim()) lines.push(JSON.parse(line));
      }
      callback();
    },
  });
  return { lines, stream };
}

describe("createLogger", () => {
  it("writes JSON with the service fields and a string level", () => {
    const { lines, stream } = createCapture();
    const logger = createLogger({ service: "cli", version: "1.2.3", stream });

    logger.info({ container: "test-bucket" }, "Container ready");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "info",
      msg: "Container ready",
      container: "test-bucket",
      service: "cli",
      version: "1.2.3",
      environment: "development",
    });
  });

  it("drops entries below the configured level", () => {
    const { lines, stream } = createCapture();
    const logger = createLogger({ service: "cli", level: "warn", stream });

    logger.info("hidden");
    logger.warn("shown");

    expect(lines.map((l) => l.msg)).toEqual(["shown"]);
  });

  it("adds the batchId inside a batch context only", () => {
    const { lines, stream } = createCapture();
    const logger = createLogger({ service: "cli", stream });

    runWithBatchId("batch-1", () => logger.info("inside"));
    logger.info("outside");

    expect(lines[0]?.batchId).toBe("batch-1");
    expect(lines[1]).not.toHaveProperty("batchId");
  });
});

describe("batch context", () => {
  it("propagates through awaits", async () => {
    const seen = await runWithBatchId("batch-2", async () => {
      await new Promise((r) => setTimeout(r, 1));
      return getBatchId();
    });

    expect(seen).toBe("batch-2");
    expect(getBatchId()).toBeUndefined();
  });

  it("restores the outer batch after a nested one", () => {
    const seen = runWithBatchId("batch-outer", () => {
      const inner = runWithBatchId("batch-inner", () => getBatchId());
      return [inner, getBatchId()];
    });

    expect(seen).toEqual(["batch-inner", "batch-outer"]);
  });
});

describe("child loggers", () => {
  it("tags entries with the module name", () => {
    const { lines, stream } = createCapture();
    const child = createChildLogger(createLogger({ service: "cli", stream }), "bench");

    child.info("started");

    expect(lines[0]?.module).toBe("bench");
  });

  it("uses the provider key when the message format asks for it", () => {
    const { lines, stream } = createCapture();
    const factory = createLoggerFactory({
      service: "cli",
      stream,
      messageFormat: "[{provider}] {msg}",
    });

    factory.createChildLogger("s3").info("uploaded");

    expect(lines[0]?.provider).toBe("s3");
    expect(lines[0]).not.toHaveProperty("module");
  });
});
