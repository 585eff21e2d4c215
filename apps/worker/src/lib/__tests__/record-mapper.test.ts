import crypto from "crypto";
import { describe, expect, it } from "vitest";
import { MappingError } from "@/lib/errors";
import { ABSENT, mapRecord, mapRecords, resolvePath } from "@/lib/record-mapper";
import { validateBatch } from "@/lib/record-validator";
import { scenarioSchema } from "./fixtures";

const validSource = {
  fundName: " Fund A ",
  positionDate: "15/03/2024",
  quote: "12.3456789",
  details: { group: "ACOES" }
};

describe("resolvePath", () => {
  it("descends nested objects and arrays", () => {
    const record = { a: { b: [{ c: 1 }, { c: 2 }] } };
    expect(resolvePath(record, "a.b.1.c")).toBe(2);
  });

  it("returns the absent sentinel for missing levels", () => {
    expect(resolvePath({ a: { b: null } }, "a.b.c")).toBe(ABSENT);
    expect(resolvePath({ a: [1] }, "a.3")).toBe(ABSENT);
    expect(resolvePath({}, "a")).toBe(ABSENT);
  });

  it("prefers a flat key that holds the whole path", () => {
    expect(resolvePath({ "a.b": "flat", a: { b: "nested" } }, "a.b")).toBe("flat");
  });

  it("keeps explicit nulls distinct from absence", () => {
    expect(resolvePath({ a: null }, "a")).toBeNull();
  });
});

describe("mapRecord", () => {
  it("maps, coerces and keys a valid record", () => {
    const result = mapRecord(scenarioSchema(), validSource, 4);
    const expectedKey = crypto
      .createHash("sha256")
      .update(JSON.stringify(["Fund A", "2024-03-15"]))
      .digest("hex");

    expect(result).toEqual({
      ok: true,
      record: {
        position: 4,
        key: expectedKey,
        values: {
          NmFundo: "Fund A",
          DtPosicao: "2024-03-15",
          VlrCotacao: "12.35",
          Grupo: "ACOES"
        }
      }
    });
  });

  it("is idempotent", () => {
    const schema = scenarioSchema();
    expect(mapRecord(schema, validSource)).toEqual(mapRecord(schema, validSource));
  });

  it("reports a missing required source value", () => {
    const { quote: _quote, ...source } = validSource;
    const result = mapRecord(scenarioSchema(), source, 1);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.position).toBe(1);
    expect(result.error).toBeInstanceOf(MappingError);
    expect(result.error.code).toBe("missing_required_source");
    expect(result.error.column).toBe("VlrCotacao");
    expect(result.error.message).toBe('Required column VlrCotacao has no value at "quote".');
    expect(result.values.NmFundo).toBe("Fund A");
    expect(result.values.VlrCotacao).toBeNull();
  });

  it("treats blank strings as absent", () => {
    const result = mapRecord(scenarioSchema(), { ...validSource, quote: "   " });
    expect(result.ok ? null : result.error.code).toBe("missing_required_source");
  });

  it("leaves null-tolerant columns empty", () => {
    const result = mapRecord(scenarioSchema(), { ...validSource, details: {} });
    expect(result.ok ? result.record.values.Grupo : "failed").toBeNull();
  });

  it("rejects empty optional columns outside null tolerance", () => {
    const result = mapRecord(scenarioSchema({ null_tolerance: [] }), {
      ...validSource,
      details: {}
    });
    expect(result.ok ? null : result.error.code).toBe("untolerated_null");
  });

  it("fills declared defaults", () => {
    const result = mapRecord(scenarioSchema({ default_values: { Grupo: "RENDA FIXA" } }), {
      ...validSource,
      details: {}
    });
    expect(result.ok ? result.record.values.Grupo : null).toBe("RENDA FIXA");
  });

  it("reports values that cannot be coerced", () => {
    const result = mapRecord(scenarioSchema(), { ...validSource, quote: "n/a" });
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("invalid_value");
    expect(result.error.value).toBe("n/a");
    expect(result.error.message).toBe('Column VlrCotacao: "n/a" is not a decimal number.');
  });

  it("canonicalises fund names through the mapping", () => {
    const schema = scenarioSchema({ fund_name_mapping: { "FUND A LEGACY": "Fund A" } });
    const mapped = mapRecord(schema, { ...validSource, fundName: "FUND A LEGACY" });
    const unmapped = mapRecord(schema, { ...validSource, fundName: "Fund Z" });

    expect(mapped.ok ? mapped.record.values.NmFundo : null).toBe("Fund A");
    expect(unmapped.ok ? unmapped.record.values.NmFundo : null).toBe("Fund Z");
  });
});

describe("mapRecords", () => {
  it("keeps arrival positions and never aborts the batch", () => {
    const results = mapRecords(scenarioSchema(), [validSource, {}, validSource]);
    expect(results.map((result) => result.ok)).toEqual([true, false, true]);
    expect(results.map((result) => (result.ok ? result.record.position : result.position))).toEqual([
      0, 1, 2
    ]);
  });

  it("rejects an out-of-range number and keeps mapping the rest", () => {
    const schema = scenarioSchema();
    const { accepted, rejected } = validateBatch(
      schema,
      mapRecords(schema, [
        { ...validSource, quote: "1e2000000000" },
        { ...validSource, quote: "1" }
      ])
    );

    expect(rejected.map((rejection) => [rejection.position, rejection.outcome.status])).toEqual([
      [0, "rejected-invalid-value"]
    ]);
    expect(accepted.map((record) => record.values.VlrCotacao)).toEqual(["1.00"]);
  });
});
