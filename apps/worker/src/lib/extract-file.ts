import fs from "fs";
import path from "path";
import Papa from "papaparse";
import * as XLSX from "xlsx";
import { localCalendarDate } from "./coercion";
import { ValidationError } from "./errors";
import type { ExtractType } from "./extract-types";
import type { SkipSignal } from "./fund-reconciler";
import { ABSENT, resolvePath, type SourceRecord } from "./record-mapper";
import type { ExtractSchema } from "./schema";

export type ExtractFileKind = "JSON" | "CSV" | "XLSX";

export type ExtractFileRef = {
  readonly extractType: ExtractType;
  readonly referenceDate: string;
  readonly fileName: string;
  readonly filePath: string;
  readonly kind: ExtractFileKind;
  readonly sizeBytes: number;
};

export type ExtractFile = {
  readonly ref: ExtractFileRef;
  readonly records: SourceRecord[];
  readonly noData: { readonly message: string } | null;
  readonly skipSignals: SkipSignal[];
};

export type ExtractSource = {
  listFiles: (extractType: ExtractType, referenceDate: string) => Promise<ExtractFileRef[]>;
  readFile: (ref: ExtractFileRef, schema: ExtractSchema) => Promise<ExtractFile>;
};

const DEFAULT_NO_DATA_MESSAGE = "No data available for this date.";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const detectExtractFileKind = (fileName: string): ExtractFileKind | null => {
  const extension = path.extname(fileName).toLowerCase();
  if (extension === ".json") {
    return "JSON";
  }
  if (extension === ".csv") {
    return "CSV";
  }
  if (extension === ".xlsx") {
    return "XLSX";
  }
  return null;
};

const explodeRecords = (
  records: readonly SourceRecord[],
  explodePath: string | null
): SourceRecord[] => {
  if (!explodePath) {
    return [...records];
  }
  const exploded: SourceRecord[] = [];
  for (const record of records) {
    const children = resolvePath(record, explodePath);
    if (!Array.isArray(children)) {
      exploded.push(record);
      continue;
    }
    for (const child of children) {
      exploded.push(
        isRecord(child) ? { ...child, parent: record } : { value: child, parent: record }
      );
    }
  }
  return exploded;
};

const parseSkipSignals = (document: Record<string, unknown>, message: string): SkipSignal[] => {
  const signals: SkipSignal[] = [];
  const listed = document.noDataFunds;
  if (Array.isArray(listed)) {
    for (const entry of listed) {
      if (typeof entry === "string" && entry.trim()) {
        signals.push({ fund: entry, reason: message });
      } else if (isRecord(entry) && typeof entry.fund === "string" && entry.fund.trim()) {
        signals.push({
          fund: entry.fund,
          reason: typeof entry.reason === "string" ? entry.reason : message
        });
      }
    }
  }
  return signals;
};

const readJsonExtract = (
  text: string,
  ref: ExtractFileRef,
  schema: ExtractSchema
): Omit<ExtractFile, "ref"> => {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`${ref.fileName} is not valid JSON.`);
  }

  if (Array.isArray(document)) {
    return {
      records: explodeRecords(document.filter(isRecord), schema.explodePath),
      noData: null,
      skipSignals: []
    };
  }
  if (!isRecord(document)) {
    throw new ValidationError(`${ref.fileName} does not contain an extract envelope.`);
  }

  const message =
    typeof document.message === "string" && document.message.trim()
      ? document.message
      : DEFAULT_NO_DATA_MESSAGE;
  const skipSignals = parseSkipSignals(document, message);

  if (!schema.recordPath) {
    return {
      records: explodeRecords([document], schema.explodePath),
      noData: null,
      skipSignals
    };
  }

  const listed = resolvePath(document, schema.recordPath);
  if (listed === ABSENT || listed === null) {
    throw new ValidationError(`${ref.fileName} has no "${schema.recordPath}" list.`);
  }
  if (!Array.isArray(listed)) {
    throw new ValidationError(`${ref.fileName}: "${schema.recordPath}" is not a list.`);
  }

  if (listed.length === 0) {
    if (typeof document.fund === "string" && document.fund.trim()) {
      skipSignals.push({ fund: document.fund, reason: message });
    }
    return { records: [], noData: { message }, skipSignals };
  }

  return {
    records: explodeRecords(listed.filter(isRecord), schema.explodePath),
    noData: null,
    skipSignals
  };
};

const readCsvExtract = (text: string, ref: ExtractFileRef): SourceRecord[] => {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim()
  });
  if (parsed.errors.length > 0) {
    throw new ValidationError(`Unable to parse ${ref.fileName}.`);
  }
  return parsed.data;
};

const readXlsxExtract = (buffer: Buffer, ref: ExtractFileRef): SourceRecord[] => {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  } catch (error) {
    throw new ValidationError(`Invalid Excel file ${ref.fileName}.`);
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ValidationError(`No worksheets were found in ${ref.fileName}.`);
  }
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    raw: true,
    defval: null,
    blankrows: false
  });
  return rows.map((row) => {
    const normalized: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(row)) {
      normalized[column] = value instanceof Date ? localCalendarDate(value) : value;
    }
    return normalized;
  });
};

export const parseExtractBuffer = (
  buffer: Buffer,
  ref: ExtractFileRef,
  schema: ExtractSchema
): ExtractFile => {
  switch (ref.kind) {
    case "JSON":
      return { ref, ...readJsonExtract(buffer.toString("utf8"), ref, schema) };
    case "CSV":
      return {
        ref,
        records: explodeRecords(readCsvExtract(buffer.toString("utf8"), ref), schema.explodePath),
        noData: null,
        skipSignals: []
      };
    case "XLSX":
      return {
        ref,
        records: explodeRecords(readXlsxExtract(buffer, ref), schema.explodePath),
        noData: null,
        skipSignals: []
      };
  }
};

/**
 * Extracts live under `<rootDir>/<extractType>/<YYYY-MM-DD>/`. A missing date
 * directory lists as no files.
 */
export const createFileExtractSource = (rootDir: string): ExtractSource => ({
  listFiles: async (extractType, referenceDate) => {
    const directory = path.join(rootDir, extractType, referenceDate);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const refs: ExtractFileRef[] = [];
    for (const entry of entries.sort((left, right) => left.name.localeCompare(right.name))) {
      const kind = entry.isFile() ? detectExtractFileKind(entry.name) : null;
      if (!kind) {
        continue;
      }
      const filePath = path.join(directory, entry.name);
      const stats = await fs.promises.stat(filePath);
      refs.push({
        extractType,
        referenceDate,
        fileName: entry.name,
        filePath,
        kind,
        sizeBytes: stats.size
      });
    }
    return refs;
  },
  readFile: async (ref, schema) => {
    const buffer = await fs.promises.readFile(ref.filePath);
    return parseExtractBuffer(buffer, ref, schema);
  }
});
