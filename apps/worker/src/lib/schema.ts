import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  coerceValue,
  parseColumnType,
  type ColumnType,
  type TargetValue
} from "./coercion";
import { SchemaError } from "./errors";
import { EXTRACT_TYPES, type ExtractType } from "./extract-types";
import { deepFreeze } from "./freeze";

const schemaDocumentSchema = z
  .object({
    extract_type: z.enum(EXTRACT_TYPES),
    target_table: z.string().min(1),
    record_path: z.string().min(1).optional(),
    explode_path: z.string().min(1).optional(),
    column_mapping: z.record(z.string().min(1), z.string().min(1)),
    data_types: z.record(z.string().min(1), z.string().min(1)),
    decimal_precisions: z.record(z.string().min(1), z.number().int().min(0).max(30)).default({}),
    required_columns: z.array(z.string().min(1)).min(1),
    validation_rules: z.record(z.string().min(1), z.array(z.string()).min(1)).default({}),
    default_values: z
      .record(z.string().min(1), z.union([z.string(), z.number(), z.boolean()]))
      .default({}),
    fund_name_mapping: z.record(z.string().min(1), z.string().min(1)).optional(),
    null_tolerance: z.array(z.string().min(1)).default([]),
    fund_column: z.string().min(1),
    date_column: z.string().min(1),
    natural_key: z.array(z.string().min(1)).min(1),
    percent_columns: z.array(z.string().min(1)).default([])
  })
  .strict();

export type SchemaDocument = z.input<typeof schemaDocumentSchema>;

export type SchemaDefinition<T extends ExtractType = ExtractType> = {
  readonly extractType: T;
  readonly targetTable: string;
  readonly recordPath: string | null;
  readonly explodePath: string | null;
  readonly columnMapping: ReadonlyArray<{ readonly source: string; readonly target: string }>;
  readonly columns: readonly string[];
  readonly dataTypes: Readonly<Record<string, ColumnType>>;
  readonly decimalPrecisions: Readonly<Record<string, number>>;
  readonly requiredColumns: readonly string[];
  readonly validationRules: Readonly<Record<string, readonly string[]>>;
  readonly defaultValues: Readonly<Record<string, TargetValue>>;
  readonly fundNameMapping: Readonly<Record<string, string>> | null;
  readonly nullTolerance: readonly string[];
  readonly fundColumn: string;
  readonly dateColumn: string;
  readonly naturalKey: readonly string[];
  readonly percentColumns: readonly string[];
};

export type PortfolioSchema = SchemaDefinition<"portfolio">;
export type ProfitabilitySchema = SchemaDefinition<"profitability">;
export type StatementSchema = SchemaDefinition<"statement">;

export type ExtractSchema = PortfolioSchema | ProfitabilitySchema | StatementSchema;

export type SchemaRegistry = {
  readonly portfolio: PortfolioSchema;
  readonly profitability: ProfitabilitySchema;
  readonly statement: StatementSchema;
};

const formatZodIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );

const checkKnownColumns = (
  issues: string[],
  label: string,
  columns: Iterable<string>,
  known: Set<string>
) => {
  for (const column of columns) {
    if (!known.has(column)) {
      issues.push(`${label} references unknown column "${column}"`);
    }
  }
};

export const parseSchemaDocument = <T extends ExtractType>(
  extractType: T,
  document: unknown
): SchemaDefinition<T> => {
  const parsed = schemaDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new SchemaError(extractType, formatZodIssues(parsed.error));
  }

  const doc = parsed.data;
  const issues: string[] = [];

  if (doc.extract_type !== extractType) {
    issues.push(`extract_type "${doc.extract_type}" does not match "${extractType}"`);
  }

  const columnMapping: Array<{ source: string; target: string }> = [];
  const columns: string[] = [];
  for (const [source, target] of Object.entries(doc.column_mapping)) {
    if (columns.includes(target)) {
      issues.push(`column_mapping maps more than one source to "${target}"`);
      continue;
    }
    columnMapping.push({ source, target });
    columns.push(target);
  }
  for (const column of Object.keys(doc.default_values)) {
    if (!columns.includes(column)) {
      columns.push(column);
    }
  }

  const known = new Set(columns);

  for (const column of doc.required_columns) {
    if (!known.has(column)) {
      issues.push(
        `required column "${column}" is neither mapped nor given a default value`
      );
    }
  }

  const dataTypes: Record<string, ColumnType> = {};
  for (const [column, declared] of Object.entries(doc.data_types)) {
    if (!known.has(column)) {
      issues.push(`data_types references unknown column "${column}"`);
      continue;
    }
    const type = parseColumnType(declared);
    if (!type) {
      issues.push(`column "${column}" has unsupported type "${declared}"`);
      continue;
    }
    dataTypes[column] = type;
  }
  for (const column of columns) {
    if (!(column in doc.data_types)) {
      issues.push(`column "${column}" has no data type`);
    }
  }

  const decimalPrecisions: Record<string, number> = {};
  for (const [column, type] of Object.entries(dataTypes)) {
    if (type.kind !== "decimal") {
      continue;
    }
    const declaredScale = doc.decimal_precisions[column];
    const scale = declaredScale ?? type.scale;
    if (scale === null || scale === undefined) {
      issues.push(`decimal column "${column}" has no scale`);
      continue;
    }
    if (type.precision !== null && scale > type.precision) {
      issues.push(
        `decimal column "${column}" scale ${scale} exceeds precision ${type.precision}`
      );
      continue;
    }
    decimalPrecisions[column] = scale;
  }
  for (const column of Object.keys(doc.decimal_precisions)) {
    if (dataTypes[column] && dataTypes[column].kind !== "decimal") {
      issues.push(`decimal_precisions names non-decimal column "${column}"`);
    }
  }

  checkKnownColumns(issues, "validation_rules", Object.keys(doc.validation_rules), known);
  checkKnownColumns(issues, "null_tolerance", doc.null_tolerance, known);
  checkKnownColumns(issues, "natural_key", doc.natural_key, known);
  checkKnownColumns(issues, "percent_columns", doc.percent_columns, known);
  checkKnownColumns(issues, "fund_column", [doc.fund_column], known);
  checkKnownColumns(issues, "date_column", [doc.date_column], known);

  for (const column of doc.null_tolerance) {
    if (doc.required_columns.includes(column)) {
      issues.push(`required column "${column}" cannot be null tolerant`);
    }
  }
  for (const column of doc.percent_columns) {
    if (dataTypes[column] && dataTypes[column].kind !== "decimal") {
      issues.push(`percent column "${column}" must be a decimal`);
    }
  }

  const defaultValues: Record<string, TargetValue> = {};
  for (const [column, value] of Object.entries(doc.default_values)) {
    const type = dataTypes[column];
    if (!type) {
      continue;
    }
    const coerced = coerceValue(type, value, { scale: decimalPrecisions[column] });
    if (!coerced.ok) {
      issues.push(`default for "${column}" is invalid: ${coerced.reason}`);
      continue;
    }
    defaultValues[column] = coerced.value;
  }

  if (issues.length > 0) {
    throw new SchemaError(extractType, issues);
  }

  const definition: SchemaDefinition<T> = {
    extractType,
    targetTable: doc.target_table,
    recordPath: doc.record_path ?? null,
    explodePath: doc.explode_path ?? null,
    columnMapping,
    columns,
    dataTypes,
    decimalPrecisions,
    requiredColumns: [...doc.required_columns],
    validationRules: doc.validation_rules,
    defaultValues,
    fundNameMapping: doc.fund_name_mapping ?? null,
    nullTolerance: doc.null_tolerance,
    fundColumn: doc.fund_column,
    dateColumn: doc.date_column,
    naturalKey: doc.natural_key,
    percentColumns: doc.percent_columns
  };
  return deepFreeze(definition);
};

export const createSchemaRegistry = (
  documents: Record<ExtractType, unknown>
): SchemaRegistry =>
  deepFreeze({
    portfolio: parseSchemaDocument("portfolio", documents.portfolio),
    profitability: parseSchemaDocument("profitability", documents.profitability),
    statement: parseSchemaDocument("statement", documents.statement)
  });

const readSchemaDocument = (configDir: string, extractType: ExtractType): unknown => {
  const filePath = path.join(configDir, "schemas", `${extractType}.json`);
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new SchemaError(extractType, [`unable to read ${filePath}`]);
  }
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new SchemaError(extractType, [`${filePath} is not valid JSON`]);
  }
};

export const loadSchemaRegistry = (configDir: string): SchemaRegistry =>
  createSchemaRegistry({
    portfolio: readSchemaDocument(configDir, "portfolio"),
    profitability: readSchemaDocument(configDir, "profitability"),
    statement: readSchemaDocument(configDir, "statement")
  });

export const getSchema = <T extends ExtractType>(
  registry: SchemaRegistry,
  extractType: T
): SchemaRegistry[T] => registry[extractType];
