import { describe, expect, it } from "vitest";
import { ConfigError, SchemaError } from "@/lib/errors";
import { getSchema, loadSchemaRegistry, parseSchemaDocument } from "@/lib/schema";
import { configDir, loadConfigSchemas, scenarioDocument } from "./fixtures";

const captureSchemaError = (run: () => unknown): SchemaError => {
  try {
    run();
  } catch (error) {
    if (error instanceof SchemaError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a SchemaError");
};

describe("schema registry", () => {
  it("loads and freezes the shipped schema documents", () => {
    const registry = loadConfigSchemas();
    const portfolio = getSchema(registry, "portfolio");

    expect(portfolio.extractType).toBe("portfolio");
    expect(portfolio.requiredColumns).toEqual(["NmFundo", "DtPosicao", "VlrCotacao"]);
    expect(portfolio.decimalPrecisions.VlrCotacao).toBe(8);
    expect(portfolio.columns[portfolio.columns.length - 1]).toBe("Custodiante");
    expect(portfolio.defaultValues).toEqual({ Custodiante: "CUSTODIAN" });
    expect(Object.isFrozen(portfolio)).toBe(true);
    expect(Object.isFrozen(portfolio.columns)).toBe(true);

    expect(registry.profitability.recordPath).toBe("result");
    expect(registry.profitability.explodePath).toBe("data");
    expect(registry.statement.fundColumn).toBe("NmFundo");
  });

  it("keeps column mapping order", () => {
    const schema = parseSchemaDocument("portfolio", scenarioDocument());
    expect(schema.columnMapping.map((entry) => entry.target)).toEqual([
      "NmFundo",
      "DtPosicao",
      "VlrCotacao",
      "Grupo"
    ]);
  });

  it("rejects required columns that are neither mapped nor defaulted", () => {
    const error = captureSchemaError(() =>
      parseSchemaDocument(
        "portfolio",
        scenarioDocument({
          column_mapping: { fundName: "NmFundo", positionDate: "DtPosicao", "details.group": "Grupo" },
          data_types: { NmFundo: "string", DtPosicao: "date", Grupo: "string" }
        })
      )
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.extractType).toBe("portfolio");
    expect(error.issues).toEqual([
      'required column "VlrCotacao" is neither mapped nor given a default value'
    ]);
  });

  it("reports every invariant violation at once", () => {
    const error = captureSchemaError(() =>
      parseSchemaDocument(
        "statement",
        scenarioDocument({
          data_types: {
            NmFundo: "string",
            DtPosicao: "date",
            VlrCotacao: "decimal",
            Grupo: "varchar"
          }
        })
      )
    );

    expect(error.issues).toEqual([
      'extract_type "portfolio" does not match "statement"',
      'column "Grupo" has unsupported type "varchar"',
      'decimal column "VlrCotacao" has no scale'
    ]);
    expect(error.message).toBe(
      'Invalid statement schema: extract_type "portfolio" does not match "statement"; ' +
        'column "Grupo" has unsupported type "varchar"; decimal column "VlrCotacao" has no scale'
    );
  });

  it("rejects null tolerance on required columns and invalid defaults", () => {
    const error = captureSchemaError(() =>
      parseSchemaDocument(
        "portfolio",
        scenarioDocument({
          null_tolerance: ["Grupo", "NmFundo"],
          default_values: { DtPosicao: "not-a-date" }
        })
      )
    );

    expect(error.issues).toEqual([
      'required column "NmFundo" cannot be null tolerant',
      'default for "DtPosicao" is invalid: "not-a-date" is not a calendar date'
    ]);
  });

  it("rejects unknown columns in rules and keys", () => {
    const error = captureSchemaError(() =>
      parseSchemaDocument(
        "portfolio",
        scenarioDocument({
          validation_rules: { Moeda: ["BRL"] },
          natural_key: ["NmFundo", "NmAtivo"]
        })
      )
    );

    expect(error.issues).toEqual([
      'validation_rules references unknown column "Moeda"',
      'natural_key references unknown column "NmAtivo"'
    ]);
  });

  it("surfaces structural problems from the document shape", () => {
    const document: Record<string, unknown> = scenarioDocument();
    delete document.target_table;
    const error = captureSchemaError(() => parseSchemaDocument("portfolio", document));
    expect(error.issues[0]?.startsWith("target_table")).toBe(true);
  });

  it("fails when the schema directory cannot be read", () => {
    const error = captureSchemaError(() => loadSchemaRegistry(`${configDir}/missing`));
    expect(error.extractType).toBe("portfolio");
    expect(error.issues[0]?.startsWith("unable to read")).toBe(true);
  });
});
