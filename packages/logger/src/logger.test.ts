import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger, createChildLogger } from "./logger.js";

function captureStream(): { stream: Writable; lines: () => Record<string, unknown>[] } {
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
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe("createLogger", () => {
  it("writes JSON with the service name and redacts secrets", () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ service: "kb-worker", destination: stream });

    logger.info({ apiKey: "test-secret", tenantId: "t-1" }, "embedding");

    const [line] = lines();
    expect(line?.["name"]).toBe("kb-worker");
    expect(line?.["msg"]).toBe("embedding");
    expect(line?.["apiKey"]).toBe("[REDACTED]");
    expect(line?.["tenantId"]).toBe("t-1");
  });

  it("redacts nested provider keys", () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ destination: stream });

    logger.info({ config: { openai: { apiKey: "test-secret", model: "m" } } }, "boot");

    const [line] = lines();
    expect(line?.["config"]).toEqual({ openai: { apiKey: "[REDACTED]", model: "m" } });
  });

  it("child loggers carry bindings", () => {
    const { stream, lines } = captureStream();
    const child = createChildLogger(createLogger({ destination: stream }), { jobId: "job-7" });

    child.warn("slow batch");

    const [line] = lines();
    expect(line?.["jobId"]).toBe("job-7");
    expect(line?.["level"]).toBe(40);
  });
});
