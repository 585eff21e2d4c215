import type { MappingResult, TargetRecord, TargetRow } from "./record-mapper";
import type { ExtractSchema } from "./schema";

export type RejectionStatus =
  | "rejected-missing-required"
  | "rejected-invalid-enum"
  | "rejected-duplicate"
  | "rejected-invalid-value";

export type RejectedOutcome = {
  readonly status: RejectionStatus;
  readonly field: string;
  readonly value: unknown;
  readonly message: string;
};

export type ValidationOutcome = { readonly status: "accepted" } | RejectedOutcome;

export type Rejection = {
  readonly position: number;
  readonly values: TargetRow;
  readonly outcome: RejectedOutcome;
};

export type BatchValidation = {
  accepted: TargetRecord[];
  rejected: Rejection[];
  outcomes: ValidationOutcome[];
};

const ACCEPTED: ValidationOutcome = { status: "accepted" };

const isEmpty = (value: unknown) => value === null || value === undefined || value === "";

/**
 * Per-record checks that do not depend on the rest of the batch: required presence
 * first, then enumerated value sets in column order.
 */
export const checkRecord = (
  schema: ExtractSchema,
  values: TargetRow
): RejectedOutcome | null => {
  for (const column of schema.requiredColumns) {
    if (isEmpty(values[column])) {
      return {
        status: "rejected-missing-required",
        field: column,
        value: null,
        message: `Required column ${column} is empty.`
      };
    }
  }

  for (const [column, allowed] of Object.entries(schema.validationRules)) {
    const value = values[column];
    if (isEmpty(value)) {
      continue;
    }
    if (!allowed.includes(String(value))) {
      return {
        status: "rejected-invalid-enum",
        field: column,
        value,
        message: `Value ${JSON.stringify(value)} is not allowed for ${column}.`
      };
    }
  }

  return null;
};

const fromMappingFailure = (
  result: Extract<MappingResult, { ok: false }>
): RejectedOutcome => ({
  status:
    result.error.code === "missing_required_source"
      ? "rejected-missing-required"
      : "rejected-invalid-value",
  field: result.error.column,
  value: result.error.value,
  message: result.error.message
});

export const validateBatch = (
  schema: ExtractSchema,
  results: readonly MappingResult[]
): BatchValidation => {
  const accepted: TargetRecord[] = [];
  const rejected: Rejection[] = [];
  const outcomes: ValidationOutcome[] = [];
  const seenKeys = new Map<string, number>();

  for (const result of results) {
    if (!result.ok) {
      const outcome = fromMappingFailure(result);
      rejected.push({ position: result.position, values: result.values, outcome });
      outcomes.push(outcome);
      continue;
    }

    const { record } = result;
    let outcome = checkRecord(schema, record.values);

    if (!outcome) {
      const firstPosition = seenKeys.get(record.key);
      if (firstPosition === undefined) {
        seenKeys.set(record.key, record.position);
      } else {
        outcome = {
          status: "rejected-duplicate",
          field: schema.naturalKey.join("+"),
          value: schema.naturalKey.map((column) => record.values[column] ?? null),
          message: `Duplicate of record at position ${firstPosition}.`
        };
      }
    }

    if (outcome) {
      rejected.push({ position: record.position, values: record.values, outcome });
      outcomes.push(outcome);
      continue;
    }

    accepted.push(record);
    outcomes.push(ACCEPTED);
  }

  return { accepted, rejected, outcomes };
};

export const isFailingRejection = (rejection: { readonly status: RejectionStatus }) =>
  rejection.status !== "rejected-duplicate";
