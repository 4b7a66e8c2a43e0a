import { describe, expect, it, vi } from "vitest";
import { createConsoleLogger, createRecordingLogger } from "./index.js";

function createSink() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("console logger", () => {
  it("writes one JSON line per entry on the matching console method", () => {
    const sink = createSink();
    const logger = createConsoleLogger("webhook", sink);

    logger.warn("multiple line items", { organizationId: "org_1" });

    expect(sink.warn).toHaveBeenCalledTimes(1);
    expect(sink.warn).toHaveBeenCalledWith(
      '{"type":"log","level":"warn","scope":"webhook","message":"multiple line items","organizationId":"org_1"}',
    );
    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.error).not.toHaveBeenCalled();
  });

  it("flattens errors into name and message", () => {
    const sink = createSink();
    const logger = createConsoleLogger("usage", sink);

    logger.error("report failed", { error: new TypeError("socket hang up") });

    expect(sink.error).toHaveBeenCalledWith(
      '{"type":"log","level":"error","scope":"usage","message":"report failed","error":{"name":"TypeError","message":"socket hang up"}}',
    );
  });

  it("keeps the envelope when a field reuses one of its keys", () => {
    const sink = createSink();
    const logger = createConsoleLogger("billing-api", sink);

    logger.info("job finished", { message: "spoofed", level: "error", jobId: "job_1" });

    expect(sink.log).toHaveBeenCalledWith(
      '{"type":"log","level":"info","scope":"billing-api","message":"job finished","jobId":"job_1"}',
    );
    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe("recording logger", () => {
  it("keeps entries by level", () => {
    const logger = createRecordingLogger();

    logger.info("a");
    logger.warn("b", { key: 1 });
    logger.warn("c");

    expect(logger.messages("warn")).toEqual(["b", "c"]);
    expect(logger.entries[1]).toEqual({
      level: "warn",
      scope: "test",
      message: "b",
      fields: { key: 1 },
    });
  });
});
