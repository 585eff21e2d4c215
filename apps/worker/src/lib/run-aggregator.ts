import { RunFinalizedError, ValidationError } from "./errors";
import { extractTypeLabels, type ExtractType } from "./extract-types";
import { deepFreeze } from "./freeze";
import { normalizeFundName, type FundStatus } from "./fund-reconciler";
import { formatErrorName } from "./logger";
import { isFailingRejection, type Rejection, type RejectionStatus } from "./record-validator";

export type FileStatus = "success" | "no_data" | "failure";

export type FileResult = {
  readonly fileName: string;
  readonly referenceDate: string;
  readonly totalRecords: number;
  readonly inserted: number;
  readonly rejected: number;
  readonly sizeBytes: number;
  readonly durationMs: number;
  readonly status: FileStatus;
  readonly message?: string;
};

export type RunRejection = {
  readonly extractType: ExtractType;
  readonly fileName: string;
  readonly referenceDate: string;
  readonly position: number;
  readonly status: RejectionStatus;
  readonly field: string;
  readonly value: unknown;
  readonly message: string;
};

export type RunError = {
  readonly extractType: ExtractType | null;
  readonly fileName: string | null;
  readonly referenceDate: string | null;
  readonly errorName: string;
  readonly message: string;
};

export type FundReference = {
  readonly extractType: ExtractType;
  readonly fund: string;
  readonly referenceDate: string;
  readonly note?: string;
};

export type RunTotals = {
  readonly files: number;
  readonly sizeBytes: number;
  readonly totalRecords: number;
  readonly inserted: number;
  readonly rejected: number;
  readonly uniqueFunds: number;
  readonly durationMs: number;
};

export type RunStatus = "success" | "failure";

export type ExtractSummary = {
  readonly extractType: ExtractType;
  readonly label: string;
  readonly status: RunStatus;
  readonly failureReasons: readonly string[];
  readonly files: readonly FileResult[];
  readonly fundStatuses: readonly FundStatus[];
  readonly unexpectedFunds: readonly string[];
  readonly rejections: readonly RunRejection[];
  readonly errors: readonly RunError[];
  readonly totals: RunTotals;
};

export type RunSummary = {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly referenceDates: readonly string[];
  readonly status: RunStatus;
  readonly statusLabel: "SUCESSO" | "FALHA";
  readonly failureReasons: readonly string[];
  readonly extracts: readonly ExtractSummary[];
  readonly missingFunds: readonly FundReference[];
  readonly criticalFunds: readonly FundReference[];
  readonly skippedFunds: readonly FundReference[];
  readonly unexpectedFunds: readonly FundReference[];
  readonly rejections: readonly RunRejection[];
  readonly errors: readonly RunError[];
  readonly cancelled: { readonly reason: string } | null;
  readonly totals: RunTotals;
};

export type ErrorLocation = {
  fileName?: string;
  referenceDate?: string;
};

export type ExtractAccumulator = {
  readonly extractType: ExtractType;
  recordFileResult: (result: FileResult) => void;
  recordFundStatuses: (
    referenceDate: string,
    statuses: readonly FundStatus[],
    unexpectedFunds?: readonly string[]
  ) => void;
  recordRejections: (
    location: { fileName: string; referenceDate: string },
    rejections: readonly Rejection[]
  ) => void;
  recordError: (error: unknown, location?: ErrorLocation) => void;
};

export type RunAggregator = {
  readonly runId: string;
  partition: (extractType: ExtractType) => ExtractAccumulator;
  recordError: (error: unknown, location?: ErrorLocation) => void;
  cancel: (reason: string) => void;
  finalize: () => RunSummary;
};

type PartitionState = {
  files: FileResult[];
  fundStatuses: FundStatus[];
  unexpectedFunds: Array<{ fund: string; referenceDate: string }>;
  rejections: RunRejection[];
  errors: RunError[];
};

const toRunError = (
  extractType: ExtractType | null,
  error: unknown,
  location: ErrorLocation = {}
): RunError => ({
  extractType,
  fileName: location.fileName ?? null,
  referenceDate: location.referenceDate ?? null,
  errorName: formatErrorName(error),
  message: error instanceof Error ? error.message : String(error)
});

const countUniqueFunds = (funds: Iterable<string>) =>
  new Set(Array.from(funds, normalizeFundName)).size;

const observedFunds = (state: PartitionState): string[] => [
  ...state.fundStatuses.filter((status) => status.recordCount > 0).map((status) => status.fund),
  ...state.unexpectedFunds.map((entry) => entry.fund)
];

const sumTotals = (files: readonly FileResult[], uniqueFunds: number): RunTotals => ({
  files: files.length,
  sizeBytes: files.reduce((sum, file) => sum + file.sizeBytes, 0),
  totalRecords: files.reduce((sum, file) => sum + file.totalRecords, 0),
  inserted: files.reduce((sum, file) => sum + file.inserted, 0),
  rejected: files.reduce((sum, file) => sum + file.rejected, 0),
  uniqueFunds,
  durationMs: files.reduce((sum, file) => sum + file.durationMs, 0)
});

const summarizePartition = (
  extractType: ExtractType,
  state: PartitionState
): ExtractSummary => {
  const label = extractTypeLabels[extractType];
  const failureReasons: string[] = [];

  if (state.files.length === 0) {
    failureReasons.push(`${label}: no files were processed`);
  }
  const failedFiles = state.files.filter((file) => file.status === "failure").length;
  if (failedFiles > 0) {
    failureReasons.push(`${label}: ${failedFiles} file(s) failed`);
  }
  const failingRejections = state.rejections.filter(isFailingRejection).length;
  if (failingRejections > 0) {
    failureReasons.push(`${label}: ${failingRejections} record(s) rejected`);
  }
  const critical = state.fundStatuses.filter((status) => status.status === "critical");
  if (critical.length > 0) {
    failureReasons.push(
      `${label}: critical fund(s) without data: ${critical.map((status) => status.fund).join(", ")}`
    );
  }
  if (state.errors.length > 0) {
    failureReasons.push(`${label}: ${state.errors.length} error(s) recorded`);
  }

  return {
    extractType,
    label,
    status: failureReasons.length === 0 ? "success" : "failure",
    failureReasons,
    files: [...state.files],
    fundStatuses: [...state.fundStatuses],
    unexpectedFunds: Array.from(new Set(state.unexpectedFunds.map((entry) => entry.fund))),
    rejections: [...state.rejections],
    errors: [...state.errors],
    totals: sumTotals(state.files, countUniqueFunds(observedFunds(state)))
  };
};

const fundsWithStatus = (
  extracts: readonly ExtractSummary[],
  status: FundStatus["status"]
): FundReference[] =>
  extracts.flatMap((extract) =>
    extract.fundStatuses
      .filter((entry) => entry.status === status)
      .map((entry) => ({
        extractType: extract.extractType,
        fund: entry.fund,
        referenceDate: entry.referenceDate,
        ...(entry.note ? { note: entry.note } : {})
      }))
  );

export const createRunAggregator = ({
  runId,
  extractTypes,
  referenceDates,
  now = () => Date.now()
}: {
  runId: string;
  extractTypes: readonly ExtractType[];
  referenceDates: readonly string[];
  now?: () => number;
}): RunAggregator => {
  const startedAt = now();
  const partitions = new Map<ExtractType, PartitionState>();
  const accumulators = new Map<ExtractType, ExtractAccumulator>();
  const runErrors: RunError[] = [];
  let cancelled: { reason: string } | null = null;
  let summary: RunSummary | null = null;

  const assertOpen = () => {
    if (summary) {
      throw new RunFinalizedError();
    }
  };

  for (const extractType of extractTypes) {
    if (partitions.has(extractType)) {
      continue;
    }
    const state: PartitionState = {
      files: [],
      fundStatuses: [],
      unexpectedFunds: [],
      rejections: [],
      errors: []
    };
    partitions.set(extractType, state);
    accumulators.set(extractType, {
      extractType,
      recordFileResult: (result) => {
        assertOpen();
        state.files.push({ ...result });
      },
      recordFundStatuses: (referenceDate, statuses, unexpectedFunds = []) => {
        assertOpen();
        state.fundStatuses.push(...statuses.map((status) => ({ ...status })));
        state.unexpectedFunds.push(
          ...unexpectedFunds.map((fund) => ({ fund, referenceDate }))
        );
      },
      recordRejections: ({ fileName, referenceDate }, rejections) => {
        assertOpen();
        state.rejections.push(
          ...rejections.map((rejection) => ({
            extractType,
            fileName,
            referenceDate,
            position: rejection.position,
            status: rejection.outcome.status,
            field: rejection.outcome.field,
            // Copied so freezing the summary leaves the caller's records mutable.
            value: structuredClone(rejection.outcome.value),
            message: rejection.outcome.message
          }))
        );
      },
      recordError: (error, location) => {
        assertOpen();
        state.errors.push(toRunError(extractType, error, location));
      }
    });
  }

  const finalize = (): RunSummary => {
    if (summary) {
      return summary;
    }

    const extracts = Array.from(partitions, ([extractType, state]) =>
      summarizePartition(extractType, state)
    );
    const failureReasons = extracts.flatMap((extract) => extract.failureReasons);
    if (extracts.length === 0) {
      failureReasons.push("No extract types were processed");
    }
    if (runErrors.length > 0) {
      failureReasons.push(`${runErrors.length} run error(s) recorded`);
    }
    if (cancelled) {
      failureReasons.push(`Run cancelled: ${cancelled.reason}`);
    }

    const allFiles = extracts.flatMap((extract) => extract.files);
    const allObserved = Array.from(partitions.values()).flatMap(observedFunds);
    const finishedAt = now();
    const status: RunStatus = failureReasons.length === 0 ? "success" : "failure";

    const result: RunSummary = {
      runId,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      referenceDates: [...referenceDates],
      status,
      statusLabel: status === "success" ? "SUCESSO" : "FALHA",
      failureReasons,
      extracts,
      missingFunds: fundsWithStatus(extracts, "missing"),
      criticalFunds: fundsWithStatus(extracts, "critical"),
      skippedFunds: fundsWithStatus(extracts, "skipped"),
      unexpectedFunds: extracts.flatMap((extract) =>
        (partitions.get(extract.extractType)?.unexpectedFunds ?? []).map((entry) => ({
          extractType: extract.extractType,
          fund: entry.fund,
          referenceDate: entry.referenceDate
        }))
      ),
      rejections: extracts.flatMap((extract) => extract.rejections),
      errors: [...extracts.flatMap((extract) => extract.errors), ...runErrors],
      cancelled: cancelled ? { ...cancelled } : null,
      totals: {
        ...sumTotals(allFiles, countUniqueFunds(allObserved)),
        durationMs: finishedAt - startedAt
      }
    };
    summary = deepFreeze(result);
    return summary;
  };

  return {
    runId,
    partition: (extractType) => {
      assertOpen();
      const accumulator = accumulators.get(extractType);
      if (!accumulator) {
        throw new ValidationError(`Extract type ${extractType} is not part of run ${runId}.`);
      }
      return accumulator;
    },
    recordError: (error, location) => {
      assertOpen();
      runErrors.push(toRunError(null, error, location));
    },
    cancel: (reason) => {
      assertOpen();
      if (!cancelled) {
        cancelled = { reason };
      }
    },
    finalize
  };
};
