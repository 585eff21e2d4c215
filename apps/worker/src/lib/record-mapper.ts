import crypto from "crypto";
import { coerceValue, isBlank, type CoercionResult, type TargetValue } from "./coercion";
import { MappingError } from "./errors";
import type { ExtractSchema } from "./schema";

export type SourceRecord = Readonly<Record<string, unknown>>;

export type TargetRow = Readonly<Record<string, TargetValue>>;

export type TargetRecord = {
  readonly position: number;
  readonly key: string;
  readonly values: TargetRow;
};

export type MappingResult =
  | { readonly ok: true; readonly record: TargetRecord }
  | {
      readonly ok: false;
      readonly position: number;
      readonly values: TargetRow;
      readonly error: MappingError;
    };

export const ABSENT: unique symbol = Symbol("absent");

const isNode = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !(value instanceof Date);

/**
 * Looks a source path up in a nested record. A key holding the whole path wins
 * over descent, so flat headers containing dots still resolve.
 */
export const resolvePath = (record: unknown, sourcePath: string): unknown => {
  if (!isNode(record)) {
    return ABSENT;
  }
  if (Object.prototype.hasOwnProperty.call(record, sourcePath)) {
    return record[sourcePath];
  }

  let current: unknown = record;
  for (const segment of sourcePath.split(".")) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) {
        return ABSENT;
      }
      current = current[index];
      continue;
    }
    if (!isNode(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return ABSENT;
    }
    current = current[segment];
  }
  return current;
};

export const buildRecordKey = (
  schema: ExtractSchema,
  values: Readonly<Record<string, TargetValue>>
): string =>
  crypto
    .createHash("sha256")
    .update(JSON.stringify(schema.naturalKey.map((column) => values[column] ?? null)))
    .digest("hex");

const canonicalFundName = (schema: ExtractSchema, value: TargetValue): TargetValue => {
  if (typeof value !== "string" || !schema.fundNameMapping) {
    return value;
  }
  return Object.prototype.hasOwnProperty.call(schema.fundNameMapping, value)
    ? schema.fundNameMapping[value]
    : value;
};

const coerceColumn = (schema: ExtractSchema, column: string, raw: unknown): CoercionResult => {
  try {
    return coerceValue(schema.dataTypes[column], raw, {
      scale: schema.decimalPrecisions[column],
      percent: schema.percentColumns.includes(column)
    });
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : "value could not be converted"
    };
  }
};

export const mapRecord = (
  schema: ExtractSchema,
  source: SourceRecord,
  position = 0
): MappingResult => {
  const sourceByTarget = new Map(
    schema.columnMapping.map((entry) => [entry.target, entry.source])
  );
  const values: Record<string, TargetValue> = {};
  let failure: MappingError | null = null;

  for (const column of schema.columns) {
    const sourcePath = sourceByTarget.get(column);
    const raw = sourcePath === undefined ? ABSENT : resolvePath(source, sourcePath);

    if (raw === ABSENT || isBlank(raw)) {
      values[column] = null;
      if (Object.prototype.hasOwnProperty.call(schema.defaultValues, column)) {
        values[column] = schema.defaultValues[column];
      } else if (schema.requiredColumns.includes(column)) {
        if (!failure) {
          failure = new MappingError(
            "missing_required_source",
            column,
            null,
            `Required column ${column} has no value at "${sourcePath ?? column}".`
          );
        }
      } else if (!schema.nullTolerance.includes(column) && !failure) {
        failure = new MappingError(
          "untolerated_null",
          column,
          null,
          `Column ${column} is empty and does not tolerate nulls.`
        );
      }
      continue;
    }

    const coerced = coerceColumn(schema, column, raw);
    if (!coerced.ok) {
      values[column] = null;
      if (!failure) {
        failure = new MappingError("invalid_value", column, raw, `Column ${column}: ${coerced.reason}.`);
      }
      continue;
    }

    values[column] =
      column === schema.fundColumn ? canonicalFundName(schema, coerced.value) : coerced.value;
  }

  if (failure) {
    return { ok: false, position, values, error: failure };
  }

  return {
    ok: true,
    record: {
      position,
      key: buildRecordKey(schema, values),
      values
    }
  };
};

export const mapRecords = (
  schema: ExtractSchema,
  sources: readonly SourceRecord[]
): MappingResult[] => sources.map((source, index) => mapRecord(schema, source, index));
