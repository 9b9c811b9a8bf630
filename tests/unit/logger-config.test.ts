import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import {
  createLoggerConfig,
  createRedactConfig,
  REDACT_CENSOR,
  REDACT_PATHS,
  SERVICE_NAME,
} from "../../src/utils/logger-config.js";

function capture(): { stream: Writable; lines: () => Array<Record<string, unknown>> } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line) => JSON.parse(line)),
  };
}

describe("logger configuration", () => {
  it("builds redaction from the shared path list", () => {
    expect(createRedactConfig()).toEqual({ paths: [...REDACT_PATHS], censor: REDACT_CENSOR });
  });

  it("tags every line with the service name", () => {
    const { stream, lines } = capture();
    const logger = pino(createLoggerConfig("info"), stream);

    logger.info({ event: "ceg.trim.completed" }, "done");

    expect(lines()[0]).toMatchObject({ service: SERVICE_NAME, event: "ceg.trim.completed", msg: "done" });
  });

  it("redacts secret-like fields", () => {
    const { stream, lines } = capture();
    const logger = pino(createLoggerConfig("info"), stream);

    logger.info({ source: { token: "test-secret", name: "records" } });

    expect(lines()[0]?.source).toEqual({ token: REDACT_CENSOR, name: "records" });
  });

  it("respects the configured level", () => {
    const { stream, lines } = capture();
    const logger = pino(createLoggerConfig("warn"), stream);

    logger.info("hidden");
    logger.warn("shown");

    expect(lines().map((line) => line.msg)).toEqual(["shown"]);
  });
});
