/**
 * InvoiceVerifier – Layout extractor unit tests
 *
 * Inputs are already normalised (lower-case), as the parser hands them over.
 */

import {
  extractUniversal,
  extractSimple,
  extractNetValue,
  extractEnglish,
  extractTaxBreakdown,
} from "../parser/extractors";
import type { InvoiceVerifierLogger } from "../utils/logger";

function spyLogger(): InvoiceVerifierLogger & { debugs: string[] } {
  const debugs: string[] = [];
  return {
    debugs,
    debug(msg: string) {
      debugs.push(msg);
    },
    info() {},
    warn() {},
    error() {},
  };
}

// ─── Universal ────────────────────────────────────────────────────────────────

describe("extractUniversal", () => {
  const INVOICE = [
    "factura n° 123",
    "fecha 01/02/2024",
    "2 tornillos 5,00 10,00",
    "3 tuercas 2,50 7,50",
    "total: 17,50",
  ].join("\n");

  it("reads the last three numbers as quantity, price and line total", () => {
    const result = extractUniversal(INVOICE);
    expect(result.lines).toHaveLength(2);
    expect(result.lines[0]).toMatchObject({
      quantity: 2,
      unitPrice: 5,
      lineTotal: 10,
      computed: 10,
    });
    expect(result.lines[1]).toMatchObject({
      quantity: 3,
      unitPrice: 2.5,
      lineTotal: 7.5,
      computed: 7.5,
    });
    expect(result.lines.every((l) => l.verdict.match)).toBe(true);
  });

  it("compares the running total with the reported total", () => {
    const result = extractUniversal(INVOICE);
    expect(result.calculatedTotal).toBe(17.5);
    expect(result.reportedTotal).toBe(17.5);
    expect(result.verdict).toEqual({
      expected: 17.5,
      actual: 17.5,
      difference: 0,
      tolerance: 1,
      match: true,
    });
  });

  it("discards a large total from a small quantity and price", () => {
    const result = extractUniversal("item 2 5 1500");
    expect(result.lines).toEqual([]);
    expect(result.calculatedTotal).toBe(0);
  });

  it("keeps a large total when the quantity is not small", () => {
    const result = extractUniversal("item 10 150 1500");
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0].verdict.match).toBe(true);
    expect(result.calculatedTotal).toBe(1500);
  });

  it("skips date lines", () => {
    expect(extractUniversal("entrega 12/03/2024 2 5 10").lines).toEqual([]);
  });

  it("skips lines with metadata keywords, including substrings", () => {
    // "precio" contains "ci"
    expect(extractUniversal("precio 2 5,00 10,00").lines).toEqual([]);
    expect(extractUniversal("cliente 2 5,00 10,00").lines).toEqual([]);
  });

  it("needs at least three numbers on a line", () => {
    expect(extractUniversal("envio 5 10").lines).toEqual([]);
  });

  it("flags a line whose product is off by the line tolerance or more", () => {
    const result = extractUniversal("4 cajas 2,00 9,00");
    expect(result.lines[0].computed).toBe(8);
    expect(result.lines[0].verdict).toMatchObject({
      difference: 1,
      tolerance: 0.5,
      match: false,
    });
  });

  it("reports only the calculated total when there is no reported total", () => {
    const result = extractUniversal("2 tornillos 5,00 10,00");
    expect(result.calculatedTotal).toBe(10);
    expect(result.reportedTotal).toBeUndefined();
    expect(result.verdict).toBeUndefined();
  });

  it("logs each accepted line at debug level", () => {
    const logger = spyLogger();
    extractUniversal("2 tornillos 5,00 10,00", logger);
    expect(logger.debugs).toEqual([
      "Line: 2 x 5 = 10.00 | OCR amount: 10.00 | match",
    ]);
  });
});

// ─── Simple ───────────────────────────────────────────────────────────────────

describe("extractSimple", () => {
  it("reads quantity, description, price and total", () => {
    const result = extractSimple(
      "cantidad precio importe\n3 widget 10,00 30,00\ntotal: 30,00",
    );
    expect(result.layout).toBe("simple");
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0]).toMatchObject({
      quantity: 3,
      unitPrice: 10,
      lineTotal: 30,
      computed: 30,
    });
    expect(result.lines[0].verdict.match).toBe(true);
    expect(result.calculatedTotal).toBe(30);
  });

  it("accepts multi-word descriptions", () => {
    const result = extractSimple(
      "3 widget 10,00 30,00\n2 tornillo grande 1,50 3,00",
    );
    expect(result.lines.map((l) => [l.quantity, l.unitPrice, l.lineTotal])).toEqual([
      [3, 10, 30],
      [2, 1.5, 3],
    ]);
    expect(result.calculatedTotal).toBe(33);
  });

  it("accepts accented descriptions", () => {
    const result = extractSimple("1 camión 200,00 200,00");
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0].quantity).toBe(1);
  });

  it("flags a mismatching line", () => {
    const result = extractSimple("2 widget 10,00 25,00");
    expect(result.lines[0].verdict).toMatchObject({
      expected: 20,
      actual: 25,
      match: false,
    });
    expect(result.calculatedTotal).toBe(25);
  });

  it("ignores lines that do not fit the pattern", () => {
    expect(extractSimple("total: 33,00\nwidget 10,00").lines).toEqual([]);
  });
});

// ─── Net value ────────────────────────────────────────────────────────────────

describe("extractNetValue", () => {
  const INVOICE = [
    "cantidad descripcion precio neto valor neto iva valor total",
    "2 tornillo 5,00 10,00 21% 12,10",
    "1 tuerca 4,00 4,00 21% 4,84",
  ].join("\n");

  it("reads quantity, net price, net worth and line total", () => {
    const result = extractNetValue(INVOICE);
    expect(result.lines).toHaveLength(2);
    expect(result.lines[0]).toMatchObject({
      quantity: 2,
      netPrice: 5,
      netWorth: 10,
      computedNetWorth: 10,
      lineTotal: 12.1,
    });
    expect(result.lines[0].tax).toBeCloseTo(2.1, 10);
    expect(result.lines[0].verdict.match).toBe(true);
  });

  it("accumulates totals and tax", () => {
    const result = extractNetValue(INVOICE);
    expect(result.calculatedTotal).toBeCloseTo(16.94, 10);
    expect(result.calculatedTax).toBeCloseTo(2.94, 10);
  });

  it("works without a description word", () => {
    const result = extractNetValue("3 2,00 6,00 10 6,60");
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0]).toMatchObject({
      quantity: 3,
      netPrice: 2,
      netWorth: 6,
      lineTotal: 6.6,
    });
  });

  it("flags a net worth that does not match quantity × net price", () => {
    const result = extractNetValue("2 tornillo 5,00 12,00 21% 14,52");
    expect(result.lines[0].verdict).toMatchObject({
      expected: 10,
      actual: 12,
      match: false,
    });
  });

  it("returns zero aggregates when no line matches", () => {
    const result = extractNetValue("precio neto valor neto");
    expect(result.lines).toEqual([]);
    expect(result.calculatedTotal).toBe(0);
    expect(result.calculatedTax).toBe(0);
  });
});

// ─── English ──────────────────────────────────────────────────────────────────

describe("extractEnglish", () => {
  it("reads values placed on the line after their label", () => {
    const result = extractEnglish(
      [
        "qty",
        "2",
        "net price",
        "50,00",
        "net worth",
        "100,00",
        "vat 10%",
        "gross worth",
        "110,00",
      ].join("\n"),
    );
    expect(result).toMatchObject({
      quantity: 2,
      netPrice: 50,
      netWorth: 100,
      vatPercent: 10,
      gross: 110,
      calculatedNet: 100,
      calculatedVat: 10,
      vatMethod: "percent",
      calculatedTotal: 110,
    });
    expect(result.verdict).toMatchObject({ difference: 0, match: true });
  });

  it("derives net from quantity × net price and VAT from gross", () => {
    const result = extractEnglish("qty: 3\nnet price: 20,00\ngross: 72,60");
    expect(result.quantity).toBe(3);
    expect(result.netPrice).toBe(20);
    expect(result.gross).toBe(72.6);
    expect(result.calculatedNet).toBe(60);
    expect(result.vatMethod).toBe("gross_difference");
    expect(result.calculatedVat).toBeCloseTo(12.6, 10);
    expect(result.calculatedTotal).toBeCloseTo(72.6, 10);
    expect(result.verdict?.match).toBe(true);
  });

  it("takes the last number of a gross line and prefers the VAT percent", () => {
    const result = extractEnglish(
      "net worth 100,00\nvat 21%\ngross worth 100,00 121,00",
    );
    expect(result.gross).toBe(121);
    expect(result.vatMethod).toBe("percent");
    expect(result.calculatedTotal).toBe(121);
    expect(result.verdict?.match).toBe(true);
  });

  it("reads a decimal VAT percent", () => {
    expect(extractEnglish("qty 1\nvat 21,5%").vatPercent).toBe(21.5);
  });

  it("gives no verdict without a gross figure", () => {
    const result = extractEnglish("qty 2\nnet price 5");
    expect(result.calculatedNet).toBe(10);
    expect(result.calculatedVat).toBe(0);
    expect(result.vatMethod).toBe("none");
    expect(result.calculatedTotal).toBe(10);
    expect(result.verdict).toBeUndefined();
  });

  it("lets later labels overwrite earlier ones", () => {
    expect(extractEnglish("qty 1\nitems\nqty 4").quantity).toBe(4);
  });

  it("flags a gross figure that does not add up", () => {
    const result = extractEnglish("net worth 100,00\nvat 21%\ngross 150,00");
    expect(result.verdict).toMatchObject({
      expected: 121,
      actual: 150,
      match: false,
    });
  });
});

// ─── Tax breakdown ────────────────────────────────────────────────────────────

describe("extractTaxBreakdown", () => {
  it("adds base, IVA and a negative IRPF", () => {
    const result = extractTaxBreakdown(
      "base imponible: 100,00\niva 21%: 21,00\nirpf 15%: -15,00\ntotal: 106,00",
    );
    expect(result).toMatchObject({
      base: 100,
      iva: 21,
      irpf: -15,
      reportedTotal: 106,
      calculatedTotal: 106,
    });
    expect(result.verdict).toEqual({
      expected: 106,
      actual: 106,
      difference: 0,
      tolerance: 1,
      match: true,
    });
  });

  it("reads European grouped amounts", () => {
    const result = extractTaxBreakdown(
      "base imponible: 1.234,56\niva: 259,26\ntotal: 1.493,82",
    );
    expect(result.base).toBe(1234.56);
    expect(result.reportedTotal).toBe(1493.82);
    expect(result.calculatedTotal).toBeCloseTo(1493.82, 10);
    expect(result.verdict?.match).toBe(true);
  });

  it("flags a total that does not match", () => {
    const result = extractTaxBreakdown(
      "base imponible: 100,00\niva 21%: 21,00\ntotal: 150,00",
    );
    expect(result.irpf).toBeUndefined();
    expect(result.calculatedTotal).toBe(121);
    expect(result.verdict?.match).toBe(false);
  });

  it("attempts no calculation without a base", () => {
    const result = extractTaxBreakdown("iva: 21,00\ntotal: 121,00");
    expect(result.iva).toBe(21);
    expect(result.reportedTotal).toBe(121);
    expect(result.calculatedTotal).toBeUndefined();
    expect(result.verdict).toBeUndefined();
  });

  it("calculates without a verdict when the total is missing", () => {
    const result = extractTaxBreakdown("base imponible: 50,00\niva: 10,50");
    expect(result.calculatedTotal).toBe(60.5);
    expect(result.verdict).toBeUndefined();
  });

  it("treats an unreadable base as missing", () => {
    const result = extractTaxBreakdown("base imponible: -\niva: 21,00");
    expect(result.base).toBeUndefined();
    expect(result.calculatedTotal).toBeUndefined();
  });
});
