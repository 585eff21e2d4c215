import { ValidationError } from "./errors";

export const EXTRACT_TYPES = ["portfolio", "profitability", "statement"] as const;

export type ExtractType = (typeof EXTRACT_TYPES)[number];

export const extractTypeLabels: Record<ExtractType, string> = {
  portfolio: "Portfolio",
  profitability: "Profitability",
  statement: "Statement"
};

export const isExtractType = (value: string): value is ExtractType =>
  EXTRACT_TYPES.some((type) => type === value);

export const parseExtractTypes = (value: string): ExtractType[] => {
  const requested = value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);

  const selected: ExtractType[] = [];
  for (const entry of requested) {
    if (!isExtractType(entry)) {
      throw new ValidationError(`Unknown extract type: ${entry}`);
    }
    if (!selected.includes(entry)) {
      selected.push(entry);
    }
  }

  return EXTRACT_TYPES.filter((type) => selected.includes(type));
};
