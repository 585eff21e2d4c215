import { describe, expect, it } from "vitest";
import { RunFinalizedError, ValidationError } from "@/lib/errors";
import type { FundStatus } from "@/lib/fund-reconciler";
import type { Rejection } from "@/lib/record-validator";
import { createRunAggregator, type FileResult } from "@/lib/run-aggregator";

const referenceDate = "2024-03-15";

const fileResult = (overrides: Partial<FileResult> = {}): FileResult => ({
  fileName: "portfolio.xlsx",
  referenceDate,
  totalRecords: 3,
  inserted: 3,
  rejected: 0,
  sizeBytes: 2048,
  durationMs: 150,
  status: "success",
  ...overrides
});

const fundStatus = (fund: string, status: FundStatus["status"], recordCount = 0): FundStatus => ({
  fund,
  referenceDate,
  recordCount,
  status
});

const rejection = (status: Rejection["outcome"]["status"]): Rejection => ({
  position: 1,
  values: { NmFundo: "Fund A" },
  outcome: { status, field: "VlrCotacao", value: null, message: "Rejected." }
});

const clock = (...ticks: number[]) => {
  let index = 0;
  return () => {
    const value = ticks[Math.min(index, ticks.length - 1)] ?? 0;
    index += 1;
    return value;
  };
};

describe("run aggregator", () => {
  it("produces a successful frozen summary", () => {
    const aggregator = createRunAggregator({
      runId: "run-1",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate],
      now: clock(1_000, 4_000)
    });
    const portfolio = aggregator.partition("portfolio");
    portfolio.recordFileResult(fileResult());
    portfolio.recordFundStatuses(referenceDate, [
      fundStatus("Fund A", "success", 2),
      fundStatus("Fund B", "success", 1)
    ]);

    const summary = aggregator.finalize();

    expect(summary.status).toBe("success");
    expect(summary.statusLabel).toBe("SUCESSO");
    expect(summary.failureReasons).toEqual([]);
    expect(summary.startedAt).toBe("1970-01-01T00:00:01.000Z");
    expect(summary.finishedAt).toBe("1970-01-01T00:00:04.000Z");
    expect(summary.totals).toEqual({
      files: 1,
      sizeBytes: 2048,
      totalRecords: 3,
      inserted: 3,
      rejected: 0,
      uniqueFunds: 2,
      durationMs: 3_000
    });
    expect(summary.extracts[0]?.totals.durationMs).toBe(150);
    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.extracts[0]?.files)).toBe(true);
  });

  it("returns the same summary on repeated finalize calls", () => {
    const aggregator = createRunAggregator({
      runId: "run-2",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    aggregator.partition("portfolio").recordFileResult(fileResult());
    expect(aggregator.finalize()).toBe(aggregator.finalize());
  });

  it("fails a type that processed no files", () => {
    const aggregator = createRunAggregator({
      runId: "run-3",
      extractTypes: ["portfolio", "statement"],
      referenceDates: [referenceDate]
    });
    aggregator.partition("portfolio").recordFileResult(fileResult());

    const summary = aggregator.finalize();
    expect(summary.status).toBe("failure");
    expect(summary.statusLabel).toBe("FALHA");
    expect(summary.failureReasons).toEqual(["Statement: no files were processed"]);
  });

  it("surfaces missing and skipped funds without failing", () => {
    const aggregator = createRunAggregator({
      runId: "run-4",
      extractTypes: ["statement"],
      referenceDates: [referenceDate]
    });
    const statement = aggregator.partition("statement");
    statement.recordFileResult(fileResult({ fileName: "statement.json" }));
    statement.recordFundStatuses(
      referenceDate,
      [
        fundStatus("Fund A", "success", 3),
        { ...fundStatus("Fund B", "skipped"), note: "No data" },
        fundStatus("Fund C", "missing")
      ],
      ["Fund Z"]
    );

    const summary = aggregator.finalize();
    expect(summary.status).toBe("success");
    expect(summary.missingFunds).toEqual([
      { extractType: "statement", fund: "Fund C", referenceDate }
    ]);
    expect(summary.skippedFunds).toEqual([
      { extractType: "statement", fund: "Fund B", referenceDate, note: "No data" }
    ]);
    expect(summary.unexpectedFunds).toEqual([
      { extractType: "statement", fund: "Fund Z", referenceDate }
    ]);
    expect(summary.extracts[0]?.totals.uniqueFunds).toBe(2);
  });

  it("fails on critical funds and failing rejections but not duplicates", () => {
    const duplicatesOnly = createRunAggregator({
      runId: "run-5",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    const first = duplicatesOnly.partition("portfolio");
    first.recordFileResult(fileResult());
    first.recordRejections({ fileName: "portfolio.xlsx", referenceDate }, [
      rejection("rejected-duplicate")
    ]);
    expect(duplicatesOnly.finalize().status).toBe("success");

    const failing = createRunAggregator({
      runId: "run-6",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    const second = failing.partition("portfolio");
    second.recordFileResult(fileResult());
    second.recordRejections({ fileName: "portfolio.xlsx", referenceDate }, [
      rejection("rejected-missing-required")
    ]);
    second.recordFundStatuses(referenceDate, [fundStatus("Fund B", "critical")]);

    const summary = failing.finalize();
    expect(summary.failureReasons).toEqual([
      "Portfolio: 1 record(s) rejected",
      "Portfolio: critical fund(s) without data: Fund B"
    ]);
    expect(summary.rejections).toEqual([
      {
        extractType: "portfolio",
        fileName: "portfolio.xlsx",
        referenceDate,
        position: 1,
        status: "rejected-missing-required",
        field: "VlrCotacao",
        value: null,
        message: "Rejected."
      }
    ]);
    expect(summary.criticalFunds).toEqual([
      { extractType: "portfolio", fund: "Fund B", referenceDate }
    ]);
  });

  it("records errors and cancellation into a consistent summary", () => {
    const aggregator = createRunAggregator({
      runId: "run-7",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    const portfolio = aggregator.partition("portfolio");
    portfolio.recordFileResult(fileResult({ status: "failure", inserted: 0 }));
    portfolio.recordError(new Error("connection reset"), { fileName: "portfolio.xlsx" });
    aggregator.recordError(new ValidationError("bad input"));
    aggregator.cancel("shutdown");
    aggregator.cancel("second reason");

    const summary = aggregator.finalize();
    expect(summary.cancelled).toEqual({ reason: "shutdown" });
    expect(summary.errors).toEqual([
      {
        extractType: "portfolio",
        fileName: "portfolio.xlsx",
        referenceDate: null,
        errorName: "Error",
        message: "connection reset"
      },
      {
        extractType: null,
        fileName: null,
        referenceDate: null,
        errorName: "ValidationError",
        message: "bad input"
      }
    ]);
    expect(summary.failureReasons).toEqual([
      "Portfolio: 1 file(s) failed",
      "Portfolio: 1 error(s) recorded",
      "1 run error(s) recorded",
      "Run cancelled: shutdown"
    ]);
  });

  it("refuses records after finalize", () => {
    const aggregator = createRunAggregator({
      runId: "run-8",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    const portfolio = aggregator.partition("portfolio");
    aggregator.finalize();

    expect(() => portfolio.recordFileResult(fileResult())).toThrow(RunFinalizedError);
    expect(() => aggregator.partition("portfolio")).toThrow(RunFinalizedError);
    expect(() => aggregator.cancel("late")).toThrow(RunFinalizedError);
  });

  it("rejects partitions outside the run", () => {
    const aggregator = createRunAggregator({
      runId: "run-9",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    expect(() => aggregator.partition("statement")).toThrow(ValidationError);
  });

  it("counts unique funds across extract types", () => {
    const aggregator = createRunAggregator({
      runId: "run-10",
      extractTypes: ["portfolio", "statement"],
      referenceDates: [referenceDate]
    });
    const portfolio = aggregator.partition("portfolio");
    const statement = aggregator.partition("statement");
    portfolio.recordFileResult(fileResult());
    statement.recordFileResult(fileResult({ fileName: "statement.json" }));
    portfolio.recordFundStatuses(referenceDate, [fundStatus("Fund A", "success", 1)]);
    statement.recordFundStatuses(referenceDate, [
      fundStatus("fund a", "success", 2),
      fundStatus("Fund B", "success", 1)
    ]);

    const summary = aggregator.finalize();
    expect(summary.totals.uniqueFunds).toBe(2);
    expect(summary.extracts.map((extract) => extract.extractType)).toEqual([
      "portfolio",
      "statement"
    ]);
  });

  it("leaves rejected source values owned by the caller", () => {
    const aggregator = createRunAggregator({
      runId: "run-11",
      extractTypes: ["portfolio"],
      referenceDates: [referenceDate]
    });
    const nested = { group: ["ACOES"] };
    const portfolio = aggregator.partition("portfolio");
    portfolio.recordFileResult(fileResult());
    portfolio.recordRejections({ fileName: "portfolio.xlsx", referenceDate }, [
      {
        position: 0,
        values: {},
        outcome: {
          status: "rejected-invalid-value",
          field: "Grupo",
          value: nested,
          message: "Column Grupo: nested values cannot be stored as text."
        }
      }
    ]);

    const summary = aggregator.finalize();
    expect(summary.rejections[0]?.value).toEqual({ group: ["ACOES"] });
    expect(summary.rejections[0]?.value).not.toBe(nested);
    expect(Object.isFrozen(nested)).toBe(false);
    expect(Object.isFrozen(nested.group)).toBe(false);
  });
});
