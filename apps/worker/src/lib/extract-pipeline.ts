import { StatementError } from "@fundrun/db";
import type { ExtractFile, ExtractFileRef, ExtractSource } from "./extract-file";
import type { ExtractType } from "./extract-types";
import { reconcile, type SkipSignal } from "./fund-reconciler";
import { createRunLogger, type RunLogger } from "./logger";
import { mapRecords, type TargetRecord, type TargetRow } from "./record-mapper";
import { validateBatch } from "./record-validator";
import { rosterFor, type RosterRegistry } from "./rosters";
import {
  createRunAggregator,
  type ExtractAccumulator,
  type RunAggregator,
  type RunSummary
} from "./run-aggregator";
import { getSchema, type ExtractSchema, type SchemaRegistry } from "./schema";
import { shapeSourceRecord } from "./source-shaping";

export type RowSink = {
  insertRows: (table: string, rows: readonly TargetRow[]) => Promise<number>;
};

export type ExtractionDeps = {
  schemas: SchemaRegistry;
  rosters: RosterRegistry;
  source: ExtractSource;
  sink: RowSink;
};

export type ExtractionOptions = {
  retryAttempts?: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
};

type DateContext = {
  log: RunLogger;
  extractType: ExtractType;
  referenceDate: string;
  schema: ExtractSchema;
  accumulator: ExtractAccumulator;
  deps: ExtractionDeps;
  options: ExtractionOptions;
};

type FileOutcome = {
  observed: Map<string, number>;
  skipSignals: SkipSignal[];
};

export const createDryRunSink = (): RowSink & { counts: Map<string, number> } => {
  const counts = new Map<string, number>();
  return {
    counts,
    insertRows: async (table, rows) => {
      counts.set(table, (counts.get(table) ?? 0) + rows.length);
      return rows.length;
    }
  };
};

const abortReason = (signal: AbortSignal): string => {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === "string" && reason ? reason : "Run aborted";
};

const countFunds = (schema: ExtractSchema, accepted: readonly TargetRecord[]) => {
  const observed = new Map<string, number>();
  for (const record of accepted) {
    const fund = record.values[schema.fundColumn];
    if (fund === null || fund === undefined || fund === "") {
      continue;
    }
    const key = String(fund);
    observed.set(key, (observed.get(key) ?? 0) + 1);
  }
  return observed;
};

const insertAccepted = async (
  context: DateContext,
  ref: ExtractFileRef,
  accepted: readonly TargetRecord[]
): Promise<number> => {
  if (accepted.length === 0) {
    return 0;
  }
  const { deps, options, schema } = context;
  return context.log.withRetry(
    () =>
      deps.sink.insertRows(
        schema.targetTable,
        accepted.map((record) => record.values)
      ),
    {
      attempts: options.retryAttempts,
      delayMs: options.retryDelayMs,
      event: "ROW_INSERT",
      shouldRetry: (error) => !(error instanceof StatementError),
      context: { fileName: ref.fileName, recordCount: accepted.length }
    }
  );
};

const processFile = async (
  context: DateContext,
  ref: ExtractFileRef
): Promise<FileOutcome> => {
  const { accumulator, deps, schema, extractType, referenceDate } = context;
  const startedAt = Date.now();
  const span = context.log.startSpan("EXTRACT_FILE", { fileName: ref.fileName });

  let file: ExtractFile;
  try {
    file = await deps.source.readFile(ref, schema);
  } catch (error) {
    span.fail(error);
    accumulator.recordError(error, { fileName: ref.fileName, referenceDate });
    accumulator.recordFileResult({
      fileName: ref.fileName,
      referenceDate,
      totalRecords: 0,
      inserted: 0,
      rejected: 0,
      sizeBytes: ref.sizeBytes,
      durationMs: Date.now() - startedAt,
      status: "failure",
      message: error instanceof Error ? error.message : String(error)
    });
    return { observed: new Map(), skipSignals: [] };
  }

  if (file.noData) {
    span.end({ status: "no_data", recordCount: 0 });
    accumulator.recordFileResult({
      fileName: ref.fileName,
      referenceDate,
      totalRecords: 0,
      inserted: 0,
      rejected: 0,
      sizeBytes: ref.sizeBytes,
      durationMs: Date.now() - startedAt,
      status: "no_data",
      message: file.noData.message
    });
    return { observed: new Map(), skipSignals: file.skipSignals };
  }

  const shaped = file.records.map((record) => shapeSourceRecord(extractType, record));
  const { accepted, rejected } = validateBatch(schema, mapRecords(schema, shaped));
  if (rejected.length > 0) {
    accumulator.recordRejections({ fileName: ref.fileName, referenceDate }, rejected);
  }

  try {
    const inserted = await insertAccepted(context, ref, accepted);
    span.end({
      status: "success",
      recordCount: file.records.length,
      insertedCount: inserted,
      rejectedCount: rejected.length
    });
    accumulator.recordFileResult({
      fileName: ref.fileName,
      referenceDate,
      totalRecords: file.records.length,
      inserted,
      rejected: rejected.length,
      sizeBytes: ref.sizeBytes,
      durationMs: Date.now() - startedAt,
      status: "success"
    });
    return { observed: countFunds(schema, accepted), skipSignals: file.skipSignals };
  } catch (error) {
    span.fail(error, { recordCount: file.records.length, rejectedCount: rejected.length });
    accumulator.recordError(error, { fileName: ref.fileName, referenceDate });
    accumulator.recordFileResult({
      fileName: ref.fileName,
      referenceDate,
      totalRecords: file.records.length,
      inserted: 0,
      rejected: rejected.length,
      sizeBytes: ref.sizeBytes,
      durationMs: Date.now() - startedAt,
      status: "failure",
      message: error instanceof Error ? error.message : String(error)
    });
    return { observed: new Map(), skipSignals: file.skipSignals };
  }
};

/**
 * Returns false when the run was aborted before every file of the date was
 * processed; the date is then left unreconciled.
 */
const processDate = async (context: DateContext): Promise<boolean> => {
  const { extractType, referenceDate, deps, options, accumulator, log } = context;
  const refs = await deps.source.listFiles(extractType, referenceDate);
  if (refs.length === 0) {
    log.warn("EXTRACT_DATE_EMPTY");
  }

  const observed = new Map<string, number>();
  const skipSignals: SkipSignal[] = [];
  for (const ref of refs) {
    if (options.signal?.aborted) {
      return false;
    }
    const outcome = await processFile(context, ref);
    for (const [fund, count] of outcome.observed) {
      observed.set(fund, (observed.get(fund) ?? 0) + count);
    }
    skipSignals.push(...outcome.skipSignals);
  }

  const roster = rosterFor(deps.rosters, extractType, referenceDate);
  const { statuses, unexpectedFunds } = reconcile({
    expectedRoster: roster.expectedRoster,
    observedFunds: observed,
    criticalFunds: roster.criticalFunds,
    skipSignals,
    referenceDate
  });
  accumulator.recordFundStatuses(referenceDate, statuses, unexpectedFunds);

  for (const status of statuses) {
    if (status.status === "critical" || status.status === "missing") {
      log.warn("FUND_WITHOUT_DATA", { fund: status.fund, status: status.status });
    }
  }
  return true;
};

export const processExtractType = async ({
  runId,
  extractType,
  referenceDates,
  aggregator,
  deps,
  options = {}
}: {
  runId: string;
  extractType: ExtractType;
  referenceDates: readonly string[];
  aggregator: RunAggregator;
  deps: ExtractionDeps;
  options?: ExtractionOptions;
}): Promise<void> => {
  const accumulator = aggregator.partition(extractType);
  const schema = getSchema(deps.schemas, extractType);
  const log = createRunLogger({ runId, extractType });
  const span = log.startSpan("EXTRACT_TYPE");

  for (const referenceDate of referenceDates) {
    if (options.signal?.aborted) {
      break;
    }
    try {
      const completed = await processDate({
        log: log.child({ referenceDate }),
        extractType,
        referenceDate,
        schema,
        accumulator,
        deps,
        options
      });
      if (!completed) {
        break;
      }
    } catch (error) {
      accumulator.recordError(error, { referenceDate });
      span.fail(error, { referenceDate });
      return;
    }
  }
  span.end();
};

export const runExtraction = async ({
  runId,
  extractTypes,
  referenceDates,
  deps,
  options = {},
  now
}: {
  runId: string;
  extractTypes: readonly ExtractType[];
  referenceDates: readonly string[];
  deps: ExtractionDeps;
  options?: ExtractionOptions;
  now?: () => number;
}): Promise<RunSummary> => {
  const aggregator = createRunAggregator({ runId, extractTypes, referenceDates, now });

  await Promise.all(
    extractTypes.map((extractType) =>
      processExtractType({ runId, extractType, referenceDates, aggregator, deps, options })
    )
  );

  if (options.signal?.aborted) {
    aggregator.cancel(abortReason(options.signal));
  }

  const summary = aggregator.finalize();
  createRunLogger({ runId }).info("EXTRACTION_RUN_FINALIZED", {
    status: summary.statusLabel,
    recordCount: summary.totals.totalRecords,
    insertedCount: summary.totals.inserted,
    rejectedCount: summary.totals.rejected,
    durationMs: summary.totals.durationMs
  });
  return summary;
};
