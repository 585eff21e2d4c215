import path from "path";
import { parseRosterDocument, type RosterRegistry } from "@/lib/rosters";
import { loadSchemaRegistry, parseSchemaDocument } from "@/lib/schema";

export const configDir = path.resolve(__dirname, "..", "..", "..", "config");

export const loadConfigSchemas = () => loadSchemaRegistry(configDir);

export const scenarioDocument = (overrides: Record<string, unknown> = {}) => ({
  extract_type: "portfolio",
  target_table: "positions",
  column_mapping: {
    fundName: "NmFundo",
    positionDate: "DtPosicao",
    quote: "VlrCotacao",
    "details.group": "Grupo"
  },
  data_types: {
    NmFundo: "string",
    DtPosicao: "date",
    VlrCotacao: "decimal(20,2)",
    Grupo: "string"
  },
  required_columns: ["NmFundo", "DtPosicao", "VlrCotacao"],
  validation_rules: { Grupo: ["RENDA FIXA", "ACOES"] },
  null_tolerance: ["Grupo"],
  fund_column: "NmFundo",
  date_column: "DtPosicao",
  natural_key: ["NmFundo", "DtPosicao"],
  ...overrides
});

export const scenarioSchema = (overrides: Record<string, unknown> = {}) =>
  parseSchemaDocument("portfolio", scenarioDocument(overrides));

export const buildRosters = (
  overrides: Partial<Record<"portfolio" | "profitability" | "statement", unknown>> = {}
): RosterRegistry =>
  parseRosterDocument({
    portfolio: { expected: [], critical: [] },
    profitability: { expected: [], critical: [] },
    statement: { expected: [], critical: [] },
    ...overrides
  });
