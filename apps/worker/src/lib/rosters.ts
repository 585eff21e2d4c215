import fs from "fs";
import path from "path";
import { z } from "zod";
import { parseCalendarDate } from "./coercion";
import { ConfigError } from "./errors";
import type { ExtractType } from "./extract-types";
import { deepFreeze } from "./freeze";
import { normalizeFundName } from "./fund-reconciler";

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((value) => parseCalendarDate(value) === value, "not a calendar date");

const rosterEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      name: z.string().min(1),
      activeFrom: isoDate.optional(),
      activeUntil: isoDate.optional()
    })
    .strict()
]);

const extractRosterSchema = z
  .object({
    expected: z.array(rosterEntrySchema),
    critical: z.array(z.string().min(1)).default([])
  })
  .strict();

const rosterDocumentSchema = z
  .object({
    portfolio: extractRosterSchema,
    profitability: extractRosterSchema,
    statement: extractRosterSchema
  })
  .strict();

export type RosterFund = {
  readonly name: string;
  readonly activeFrom: string | null;
  readonly activeUntil: string | null;
};

export type ExtractRoster = {
  readonly expected: readonly RosterFund[];
  readonly critical: readonly string[];
};

export type RosterRegistry = Readonly<Record<ExtractType, ExtractRoster>>;

export type ResolvedRoster = {
  expectedRoster: string[];
  criticalFunds: string[];
};

const buildExtractRoster = (
  extractType: ExtractType,
  input: z.infer<typeof extractRosterSchema>,
  issues: string[]
): ExtractRoster => {
  const expected: RosterFund[] = [];
  const known = new Set<string>();

  for (const entry of input.expected) {
    const fund =
      typeof entry === "string"
        ? { name: entry, activeFrom: null, activeUntil: null }
        : {
            name: entry.name,
            activeFrom: entry.activeFrom ?? null,
            activeUntil: entry.activeUntil ?? null
          };
    if (fund.activeFrom && fund.activeUntil && fund.activeFrom > fund.activeUntil) {
      issues.push(`${extractType}: "${fund.name}" is active until before it is active from`);
    }
    known.add(normalizeFundName(fund.name));
    expected.push(fund);
  }

  for (const name of input.critical) {
    if (!known.has(normalizeFundName(name))) {
      issues.push(`${extractType}: critical fund "${name}" is not in the expected roster`);
    }
  }

  return { expected, critical: input.critical };
};

export const parseRosterDocument = (document: unknown): RosterRegistry => {
  const parsed = rosterDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid rosters",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const issues: string[] = [];
  const registry = {
    portfolio: buildExtractRoster("portfolio", parsed.data.portfolio, issues),
    profitability: buildExtractRoster("profitability", parsed.data.profitability, issues),
    statement: buildExtractRoster("statement", parsed.data.statement, issues)
  };
  if (issues.length > 0) {
    throw new ConfigError("Invalid rosters", issues);
  }
  return deepFreeze(registry);
};

export const loadRosterRegistry = (configDir: string): RosterRegistry => {
  const filePath = path.join(configDir, "rosters.json");
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError("Invalid rosters", [`unable to read ${filePath}`]);
  }
  let document: unknown;
  try {
    document = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError("Invalid rosters", [`${filePath} is not valid JSON`]);
  }
  return parseRosterDocument(document);
};

const isActive = (fund: RosterFund, referenceDate: string) =>
  (!fund.activeFrom || fund.activeFrom <= referenceDate) &&
  (!fund.activeUntil || referenceDate <= fund.activeUntil);

export const rosterFor = (
  registry: RosterRegistry,
  extractType: ExtractType,
  referenceDate: string
): ResolvedRoster => {
  const roster = registry[extractType];
  const expectedRoster = roster.expected
    .filter((fund) => isActive(fund, referenceDate))
    .map((fund) => fund.name);
  const active = new Set(expectedRoster.map(normalizeFundName));
  return {
    expectedRoster,
    criticalFunds: roster.critical.filter((name) => active.has(normalizeFundName(name)))
  };
};
