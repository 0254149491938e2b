import { beforeAll, beforeEach, describe, it, expect } from "vitest";
import * as slog from "./core";
import { MemorySink } from "./sinks";

const LEVELS = [
  ["debug", "debugf", "DEBUG"],
  ["info", "infof", "INFO"],
  ["notice", "noticef", "NOTICE"],
  ["warn", "warnf", "WARNING"],
  ["error", "errorf", "ERROR"],
  ["critical", "criticalf", "CRITICAL"],
  ["alert", "alertf", "ALERT"],
  ["emergency", "emergencyf", "EMERGENCY"],
] as const;

const sink = new MemorySink();

function logFromHelper(): void {
  slog.info("from helper");
}

beforeAll(() => {
  slog.setOutput(sink);
});

beforeEach(() => {
  sink.clear();
  slog.setIncludeSources(true);
});

describe("default logger", () => {
  it("is created once", () => {
    expect(slog.defaultLogger()).toBe(slog.defaultLogger());
  });

  for (const [plain, formatted, name] of LEVELS) {
    it(`writes ${name} from package functions`, () => {
      slog[plain]("hello");
      slog[formatted]("works: %s", true);
      expect(sink.records().map((r) => [r.severity, r.message])).toEqual([
        [name, "hello"],
        [name, "works: true"],
      ]);
    });
  }

  it("records the caller of package functions", () => {
    logFromHelper();
    expect(sink.last()?.["logging.googleapis.com/sourceLocation"]?.function).toBe("logFromHelper");
  });

  it("applies settings to the default logger", () => {
    slog.setIncludeSources(false);
    slog.setProject("test");
    expect(slog.defaultLogger().getProject()).toBe("test");

    slog.withSpan({ traceId: "t", spanId: "s", traceFlags: 1 }).info("traced");
    expect(sink.last()).toEqual({
      message: "traced",
      severity: "INFO",
      "logging.googleapis.com/trace": "projects/test/traces/t",
      "logging.googleapis.com/spanId": "s",
      "logging.googleapis.com/trace_sampled": true,
    });
  });

  it("starts chains on fresh entries", () => {
    slog.setIncludeSources(false);
    slog.withLabels({ hello: "world" }).info("labelled");
    slog.withDetail("hello", "world").info("detailed");
    slog.withDetails({ another: 1 }).info("detailed");
    slog.withError(new Error("boom")).info("failed");
    slog.info("plain");

    expect(sink.records()).toEqual([
      { message: "labelled", severity: "INFO", "logging.googleapis.com/labels": { hello: "world" } },
      { message: "detailed", severity: "INFO", details: { hello: "world" } },
      { message: "detailed", severity: "INFO", details: { another: 1 } },
      { message: "failed", severity: "INFO", error: "boom" },
      { message: "plain", severity: "INFO" },
    ]);
  });

  it("runs operations", () => {
    slog.setIncludeSources(false);
    const entry = slog.startOperation("123", "testProducer");
    slog.withOperation("456", "other").info("elsewhere");
    entry.endOperation();

    expect(sink.records().map((r) => r["logging.googleapis.com/operation"])).toEqual([
      { id: "123", producer: "testProducer", first: true },
      { id: "456", producer: "other" },
      { id: "123", producer: "testProducer", last: true },
    ]);
  });

  it("captures stacks from package functions", () => {
    slog.withStack().info("with stack");
    expect(sink.last()?.exception?.startsWith("Error: with stack\n    at ")).toBe(true);
  });

  it("hands out empty entries", () => {
    slog.setIncludeSources(false);
    slog.newEntry().notice("empty");
    expect(sink.last()).toEqual({ message: "empty", severity: "NOTICE" });
  });
});
