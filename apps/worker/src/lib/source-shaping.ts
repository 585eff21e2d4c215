import { isBlank, roundHalfUp } from "./coercion";
import type { ExtractType } from "./extract-types";
import type { SourceRecord } from "./record-mapper";

export type StatementEntryType = "CREDITO" | "DEBITO" | "OUTROS";

export type StatementCategory =
  | "APLICACAO"
  | "RESGATE"
  | "TAXA"
  | "RENDIMENTO"
  | "TRANSFERENCIA"
  | "OUTROS";

const CATEGORY_KEYWORDS: Array<[StatementCategory, string[]]> = [
  ["APLICACAO", ["APLICACAO", "APORTE", "DEPOSITO"]],
  ["RESGATE", ["RESGATE", "SAQUE", "RETIRADA"]],
  ["TAXA", ["TAXA", "TARIFA", "COBRANCA"]],
  ["RENDIMENTO", ["RENDIMENTO", "JUROS", "RENTABILIDADE"]],
  ["TRANSFERENCIA", ["TRANSFERENCIA", "DOC", "TED"]]
];

const toAmount = (value: unknown): number | null => {
  if (isBlank(value)) {
    return null;
  }
  const rounded = roundHalfUp(value, 8);
  return rounded === null ? null : Number(rounded);
};

export const classifyEntryType = (
  credit: number | null,
  debit: number | null
): StatementEntryType => {
  if (credit !== null && credit > 0) {
    return "CREDITO";
  }
  if (debit !== null && debit > 0) {
    return "DEBITO";
  }
  return "OUTROS";
};

export const categorizeHistory = (history: unknown): StatementCategory => {
  if (typeof history !== "string" || history.trim().length === 0) {
    return "OUTROS";
  }
  const upper = history
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toUpperCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => upper.includes(keyword))) {
      return category;
    }
  }
  return "OUTROS";
};

/**
 * Balance wins when present; otherwise the larger of credit and debit, then
 * whichever side is non-zero, then zero. The raw source value is kept so the
 * mapper applies the column's own rounding.
 */
export const selectPrincipalAmount = (record: SourceRecord): unknown => {
  const balance = toAmount(record.balance);
  if (balance !== null) {
    return record.balance;
  }
  const credit = toAmount(record.credit);
  const debit = toAmount(record.debt);
  if (credit && debit) {
    return credit >= debit ? record.credit : record.debt;
  }
  if (credit) {
    return record.credit;
  }
  if (debit) {
    return record.debt;
  }
  return 0;
};

const shapeStatementRecord = (record: SourceRecord): SourceRecord => ({
  ...record,
  principalAmount: selectPrincipalAmount(record),
  entryType: classifyEntryType(toAmount(record.credit), toAmount(record.debt)),
  category: categorizeHistory(record.history)
});

export const shapeSourceRecord = (
  extractType: ExtractType,
  record: SourceRecord
): SourceRecord => {
  switch (extractType) {
    case "statement":
      return shapeStatementRecord(record);
    case "portfolio":
    case "profitability":
      return record;
  }
};
