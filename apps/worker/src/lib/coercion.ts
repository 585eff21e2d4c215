export type TargetValue = string | number | boolean | null;

export type ColumnType =
  | { kind: "string" }
  | { kind: "text" }
  | { kind: "date" }
  | { kind: "integer" }
  | { kind: "boolean" }
  | { kind: "decimal"; precision: number | null; scale: number | null };

export type CoercionResult =
  | { ok: true; value: TargetValue }
  | { ok: false; reason: string };

type CoercionOptions = {
  scale?: number;
  percent?: boolean;
};

type ParsedDecimal = {
  negative: boolean;
  digits: string;
  exponent: number;
};

const TRUTHY = new Set(["true", "1", "yes", "y", "sim", "s", "t"]);
const FALSY = new Set(["false", "0", "no", "n", "nao", "não", "f"]);

const DECIMAL_TYPE_PATTERN = /^decimal\s*\(\s*(\d+)\s*,\s*(\d+)\s*\)$/;
const PLAIN_NUMBER_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

// No declared decimal column comes near this many digits.
const MAX_EXPONENT = 400;

const SIMPLE_TYPES = new Map<string, ColumnType>([
  ["string", { kind: "string" }],
  ["text", { kind: "text" }],
  ["date", { kind: "date" }],
  ["integer", { kind: "integer" }],
  ["boolean", { kind: "boolean" }],
  ["decimal", { kind: "decimal", precision: null, scale: null }]
]);

export const parseColumnType = (declared: string): ColumnType | null => {
  const normalized = declared.trim().toLowerCase();
  const simple = SIMPLE_TYPES.get(normalized);
  if (simple) {
    return simple;
  }

  const match = DECIMAL_TYPE_PATTERN.exec(normalized);
  if (!match) {
    return null;
  }
  const precision = Number(match[1]);
  const scale = Number(match[2]);
  if (precision < 1 || scale > precision) {
    return null;
  }
  return { kind: "decimal", precision, scale };
};

export const isBlank = (value: unknown): boolean =>
  value === undefined ||
  value === null ||
  (typeof value === "string" && value.trim().length === 0);

const describeValue = (value: unknown): string =>
  typeof value === "string" ? `"${value}"` : String(value);

const normalizeSeparators = (raw: string): string => {
  const lastComma = raw.lastIndexOf(",");
  const lastDot = raw.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    return lastComma > lastDot
      ? raw.replace(/\./g, "").replace(",", ".")
      : raw.replace(/,/g, "");
  }

  if (lastComma >= 0) {
    const commaCount = raw.split(",").length - 1;
    const decimals = raw.length - lastComma - 1;
    return commaCount === 1 && decimals !== 3
      ? raw.replace(",", ".")
      : raw.replace(/,/g, "");
  }

  if (lastDot >= 0 && raw.split(".").length > 2) {
    return raw.replace(/\./g, "");
  }

  return raw;
};

const parseDecimal = (value: unknown): ParsedDecimal | null => {
  let text: string;
  let negative = false;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return null;
    }
    text = String(value);
  } else if (typeof value === "bigint") {
    text = value.toString();
  } else if (typeof value === "string") {
    let raw = value.replace(/\s+/g, "");
    if (raw.startsWith("(") && raw.endsWith(")")) {
      negative = true;
      raw = raw.slice(1, -1);
    }
    raw = raw.replace(/^(R\$|\$)/i, "").replace(/%$/, "");
    text = normalizeSeparators(raw);
  } else {
    return null;
  }

  const match = PLAIN_NUMBER_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, sign = "", integerPart = "", fractionPart = "", exponentPart] = match;
  if (integerPart.length === 0 && fractionPart.length === 0) {
    return null;
  }

  const digits = `${integerPart}${fractionPart}`.replace(/^0+(?=\d)/, "");
  const exponent = Number(exponentPart ?? "0") - fractionPart.length;
  if (!Number.isSafeInteger(exponent) || Math.abs(exponent) > MAX_EXPONENT) {
    return null;
  }

  return {
    negative: negative !== (sign === "-"),
    digits,
    exponent
  };
};

const scaleToInteger = (parsed: ParsedDecimal, scale: number): bigint => {
  const magnitude = BigInt(parsed.digits);
  const shift = parsed.exponent + scale;
  if (shift >= 0) {
    return magnitude * 10n ** BigInt(shift);
  }

  const divisor = 10n ** BigInt(-shift);
  const quotient = magnitude / divisor;
  const remainder = magnitude % divisor;
  return remainder * 2n >= divisor ? quotient + 1n : quotient;
};

const formatScaled = (negative: boolean, scaled: bigint, scale: number): string => {
  const body = scaled.toString().padStart(scale + 1, "0");
  const sign = negative && scaled !== 0n ? "-" : "";
  if (scale === 0) {
    return `${sign}${body}`;
  }
  return `${sign}${body.slice(0, -scale)}.${body.slice(-scale)}`;
};

export const roundHalfUp = (value: unknown, scale: number): string | null => {
  const parsed = parseDecimal(value);
  if (!parsed) {
    return null;
  }
  return formatScaled(parsed.negative, scaleToInteger(parsed, scale), scale);
};

const coerceDecimal = (
  value: unknown,
  type: Extract<ColumnType, { kind: "decimal" }>,
  options: CoercionOptions
): CoercionResult => {
  const parsed = parseDecimal(value);
  if (!parsed) {
    return { ok: false, reason: `${describeValue(value)} is not a decimal number` };
  }

  const scale = options.scale ?? type.scale ?? 0;
  const adjusted = options.percent
    ? { ...parsed, exponent: parsed.exponent - 2 }
    : parsed;
  const scaled = scaleToInteger(adjusted, scale);

  const integerPart = scaled / 10n ** BigInt(scale);
  if (
    type.precision !== null &&
    integerPart !== 0n &&
    integerPart.toString().length > type.precision - scale
  ) {
    return {
      ok: false,
      reason: `${describeValue(value)} exceeds decimal(${type.precision},${scale})`
    };
  }

  return { ok: true, value: formatScaled(adjusted.negative, scaled, scale) };
};

const coerceInteger = (value: unknown): CoercionResult => {
  const parsed = parseDecimal(value);
  if (!parsed) {
    return { ok: false, reason: `${describeValue(value)} is not an integer` };
  }

  const magnitude = BigInt(parsed.digits);
  let integral: bigint;
  if (parsed.exponent >= 0) {
    integral = magnitude * 10n ** BigInt(parsed.exponent);
  } else {
    const divisor = 10n ** BigInt(-parsed.exponent);
    if (magnitude % divisor !== 0n) {
      return { ok: false, reason: `${describeValue(value)} is not an integer` };
    }
    integral = magnitude / divisor;
  }

  const result = Number(parsed.negative ? -integral : integral);
  if (!Number.isSafeInteger(result)) {
    return { ok: false, reason: `${describeValue(value)} is outside the integer range` };
  }
  return { ok: true, value: result };
};

const isCalendarDate = (year: number, month: number, day: number): boolean => {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

const formatDate = (year: number, month: number, day: number): string =>
  `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;

/**
 * Spreadsheet cells are decoded as local-time midnights, so their calendar day
 * is read with local getters.
 */
export const localCalendarDate = (value: Date): string | null =>
  Number.isNaN(value.getTime())
    ? null
    : formatDate(value.getFullYear(), value.getMonth() + 1, value.getDate());

export const parseCalendarDate = (value: unknown): string | null => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return formatDate(
      value.getUTCFullYear(),
      value.getUTCMonth() + 1,
      value.getUTCDate()
    );
  }
  if (typeof value !== "string") {
    return null;
  }

  const raw = value.trim();
  let parts: [number, number, number] | null = null;

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T\s].*)?$/.exec(raw);
  const dayFirst = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(raw);
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(raw);

  if (iso) {
    parts = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (dayFirst) {
    parts = [Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1])];
  } else if (compact) {
    parts = [Number(compact[1]), Number(compact[2]), Number(compact[3])];
  }

  if (!parts || !isCalendarDate(...parts)) {
    return null;
  }
  return formatDate(...parts);
};

const coerceBoolean = (value: unknown): CoercionResult => {
  if (typeof value === "boolean") {
    return { ok: true, value };
  }
  if (typeof value === "number" && (value === 0 || value === 1)) {
    return { ok: true, value: value === 1 };
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (TRUTHY.has(normalized)) {
      return { ok: true, value: true };
    }
    if (FALSY.has(normalized)) {
      return { ok: true, value: false };
    }
  }
  return { ok: false, reason: `${describeValue(value)} is not a recognised boolean` };
};

const coerceText = (value: unknown, trim: boolean): CoercionResult => {
  if (typeof value === "string") {
    return { ok: true, value: trim ? value.trim() : value };
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return { ok: true, value: String(value) };
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { ok: true, value: value.toISOString() };
  }
  return { ok: false, reason: "nested values cannot be stored as text" };
};

export const coerceValue = (
  type: ColumnType,
  value: unknown,
  options: CoercionOptions = {}
): CoercionResult => {
  switch (type.kind) {
    case "string":
      return coerceText(value, true);
    case "text":
      return coerceText(value, false);
    case "date": {
      const date = parseCalendarDate(value);
      return date
        ? { ok: true, value: date }
        : { ok: false, reason: `${describeValue(value)} is not a calendar date` };
    }
    case "integer":
      return coerceInteger(value);
    case "boolean":
      return coerceBoolean(value);
    case "decimal":
      return coerceDecimal(value, type, options);
  }
};
