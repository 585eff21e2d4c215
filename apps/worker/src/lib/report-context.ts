import { extractTypeLabels } from "./extract-types";
import type { FundStatusKind } from "./fund-reconciler";
import type {
  ExtractSummary,
  FileStatus,
  FundReference,
  RunSummary
} from "./run-aggregator";

export type FileRowStatus = "success" | "skipped" | "failure";

export type FileRow = {
  fileName: string;
  date: string;
  total: number | "-";
  inserted: number | "-";
  duration: string;
  statusText: FileRowStatus;
  message: string | null;
};

export type FundRow = {
  fund: string;
  date: string;
  recordCount: number;
  status: FundStatusKind;
  note: string | null;
};

export type ExtractSection = {
  extractType: ExtractSummary["extractType"];
  label: string;
  status: ExtractSummary["status"];
  files: number;
  volume: string;
  totalRecords: number;
  inserted: number;
  rejected: number;
  uniqueFunds: number;
  duration: string;
  fileRows: FileRow[];
  fundRows: FundRow[];
  unexpectedFunds: string[];
};

export type FundListSection = {
  count: number;
  displayed: string[];
  hiddenCount: number;
  tooltip: string;
};

export type ReportContext = {
  runId: string;
  status: RunSummary["statusLabel"];
  dateRange: string;
  totalDatesProcessed: number;
  extractTypes: string;
  duration: string;
  totals: {
    files: number;
    volume: string;
    totalRecords: number;
    inserted: number;
    rejected: number;
    uniqueFunds: number;
  };
  sections: ExtractSection[];
  missingFunds: FundListSection;
  criticalFunds: string[];
  skippedFunds: string[];
  rejections: string[];
  errors: string[];
  failureReasons: string[];
  cancelled: string | null;
};

const FILE_STATUS_TEXT: Record<FileStatus, FileRowStatus> = {
  success: "success",
  no_data: "skipped",
  failure: "failure"
};

export const formatMegabytes = (bytes: number): string =>
  `${(bytes / 1024 ** 2).toFixed(2)} MB`;

export const formatSeconds = (durationMs: number): string =>
  `${(durationMs / 1000).toFixed(1)} s`;

export const formatDateRange = (dates: readonly string[]): string => {
  if (dates.length === 0) {
    return "-";
  }
  const first = dates[0];
  const last = dates[dates.length - 1];
  return dates.length > 1 ? `${first} a ${last}` : first;
};

const describeFund = (entry: FundReference) =>
  `${entry.fund} (${extractTypeLabels[entry.extractType]}, ${entry.referenceDate})`;

export const buildFundList = (
  entries: readonly FundReference[],
  displayLimit: number
): FundListSection => {
  const labels = entries.map(describeFund);
  const displayed = labels.slice(0, Math.max(0, displayLimit));
  return {
    count: labels.length,
    displayed,
    hiddenCount: labels.length - displayed.length,
    tooltip: labels.join(", ")
  };
};

const buildSection = (extract: ExtractSummary): ExtractSection => ({
  extractType: extract.extractType,
  label: extract.label,
  status: extract.status,
  files: extract.totals.files,
  volume: formatMegabytes(extract.totals.sizeBytes),
  totalRecords: extract.totals.totalRecords,
  inserted: extract.totals.inserted,
  rejected: extract.totals.rejected,
  uniqueFunds: extract.totals.uniqueFunds,
  duration: formatSeconds(extract.totals.durationMs),
  fileRows: extract.files.map((file) => {
    const statusText = FILE_STATUS_TEXT[file.status];
    const skipped = statusText === "skipped";
    return {
      fileName: file.fileName,
      date: file.referenceDate,
      total: skipped ? "-" : file.totalRecords,
      inserted: skipped ? "-" : file.inserted,
      duration: skipped ? "-" : formatSeconds(file.durationMs),
      statusText,
      message: file.message ?? null
    };
  }),
  fundRows: extract.fundStatuses.map((status) => ({
    fund: status.fund,
    date: status.referenceDate,
    recordCount: status.recordCount,
    status: status.status,
    note: status.note ?? null
  })),
  unexpectedFunds: [...extract.unexpectedFunds]
});

export const buildSubject = (summary: RunSummary): string => {
  const types = summary.extracts.map((extract) => extract.label).join(" + ");
  const scope =
    summary.referenceDates.length > 1
      ? `${summary.referenceDates.length} datas`
      : formatDateRange(summary.referenceDates);
  const prefix = `Fund extracts ${types} (${scope})`;
  return summary.status === "success"
    ? `SUCESSO ${prefix}`
    : `FALHA ${prefix} - Verificar Logs`;
};

export const buildReportContext = (
  summary: RunSummary,
  { missingFundsDisplayLimit = 10 }: { missingFundsDisplayLimit?: number } = {}
): ReportContext => ({
  runId: summary.runId,
  status: summary.statusLabel,
  dateRange: formatDateRange(summary.referenceDates),
  totalDatesProcessed: summary.referenceDates.length,
  extractTypes: summary.extracts.map((extract) => extract.label.toUpperCase()).join(", "),
  duration: formatSeconds(summary.totals.durationMs),
  totals: {
    files: summary.totals.files,
    volume: formatMegabytes(summary.totals.sizeBytes),
    totalRecords: summary.totals.totalRecords,
    inserted: summary.totals.inserted,
    rejected: summary.totals.rejected,
    uniqueFunds: summary.totals.uniqueFunds
  },
  sections: summary.extracts.map(buildSection),
  missingFunds: buildFundList(summary.missingFunds, missingFundsDisplayLimit),
  criticalFunds: summary.criticalFunds.map(describeFund),
  skippedFunds: summary.skippedFunds.map(
    (entry) => `${describeFund(entry)}${entry.note ? `: ${entry.note}` : ""}`
  ),
  rejections: summary.rejections.map(
    (rejection) =>
      `${extractTypeLabels[rejection.extractType]} ${rejection.fileName} #${rejection.position}: ${rejection.message}`
  ),
  errors: summary.errors.map((error) => {
    const scope = error.extractType ? extractTypeLabels[error.extractType] : "Run";
    const where = error.fileName ? ` (${error.fileName})` : "";
    return `${scope}${where}: ${error.message}`;
  }),
  failureReasons: [...summary.failureReasons],
  cancelled: summary.cancelled ? summary.cancelled.reason : null
});
