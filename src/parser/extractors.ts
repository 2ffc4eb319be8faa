/**
 * InvoiceVerifier – Layout extractors
 *
 * One extractor per invoice layout. Each works on normalised text, line by
 * line, and never throws: a line that does not match or holds an unreadable
 * number is skipped.
 */

import type {
  EnglishAnalysis,
  ItemLine,
  NetValueAnalysis,
  NetValueLine,
  ReconciliationVerdict,
  SimpleAnalysis,
  TaxBreakdownAnalysis,
  UniversalAnalysis,
  VatMethod,
} from "../schema/InvoiceReport";
import type { InvoiceVerifierLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { INVOICE_TOLERANCE, LINE_TOLERANCE, reconcile } from "../core/reconcile";
import {
  PATTERNS,
  extractNumericTokens,
  findReportedTotal,
  tryParseNumber,
} from "./primitives";

// Lines carrying any of these are header/footer metadata, not items.
// Plain substring test: "ci" also drops "precio", "servicio" …
const METADATA_KEYWORDS = [
  "fecha",
  "nit",
  "ci",
  "cliente",
  "vendedor",
  "firma",
  "sello",
  "condiciones",
  "observaciones",
  "iban",
  "n°",
  "factura",
];

const NUM = String.raw`(\d+(?:[.,]\d+)?)`;
const WORD = "[a-záéíóúüñ]+";

// 3 widget 10,00 30,00 · 2 tornillo grande 5,00 10,00
const SIMPLE_LINE_RX = new RegExp(
  String.raw`(\d+)\s+${WORD}(?:\s+${WORD})*\s+${NUM}\s+${NUM}`,
  "i",
);

// qty [code] net-price net-worth vat% total
const NET_VALUE_LINE_RX = new RegExp(
  String.raw`${NUM}\s+[\p{L}\p{N}_]*\s*${NUM}\s+${NUM}\s+\d+%?\s+${NUM}`,
  "u",
);

const VAT_PERCENT_RX = /(\d+(?:[.,]\d+)?)\s*%/;

const BASE_RX = /base imponible[:\s]+([\d.,-]+)/i;
const IVA_RX = /iva.*?:\s*(-?\d+[.,]?\d*)/i;
const IRPF_RX = /irpf.*?:\s*(-?\d+[.,]?\d*)/i;

function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

function itemLine(
  quantity: number,
  unitPrice: number,
  lineTotal: number,
): ItemLine {
  const computed = quantity * unitPrice;
  return {
    quantity,
    unitPrice,
    lineTotal,
    computed,
    verdict: reconcile(computed, lineTotal, LINE_TOLERANCE),
  };
}

function logLine(logger: InvoiceVerifierLogger, line: ItemLine): void {
  logger.debug(
    `Line: ${line.quantity} x ${line.unitPrice} = ${line.computed.toFixed(2)} | OCR amount: ${line.lineTotal.toFixed(2)} | ${line.verdict.match ? "match" : "mismatch"}`,
  );
}

// ─── Universal (fallback) ─────────────────────────────────────────────────────

export function extractUniversal(
  text: string,
  logger: InvoiceVerifierLogger = silentLogger,
): UniversalAnalysis {
  const lines: ItemLine[] = [];
  let calculatedTotal = 0;

  for (const raw of splitLines(text)) {
    const line = raw.trim().toLowerCase();
    if (!line) continue;
    if (METADATA_KEYWORDS.some((kw) => line.includes(kw))) continue;
    if (PATTERNS.DATE_DMY.test(line)) continue;

    const nums = extractNumericTokens(line);
    if (nums.length < 3) continue;

    const quantity = tryParseNumber(nums[nums.length - 3]);
    const unitPrice = tryParseNumber(nums[nums.length - 2]);
    const lineTotal = tryParseNumber(nums[nums.length - 1]);
    if (
      quantity === undefined ||
      unitPrice === undefined ||
      lineTotal === undefined
    ) {
      logger.debug(`Skipping unreadable line: ${line}`);
      continue;
    }

    // Implausible magnitude for a line item
    if (lineTotal > 1000 && quantity < 10 && unitPrice < 100) {
      logger.debug(`Skipping implausible line: ${line}`);
      continue;
    }

    const item = itemLine(quantity, unitPrice, lineTotal);
    logLine(logger, item);
    lines.push(item);
    calculatedTotal += lineTotal;
  }

  const reportedTotal = findReportedTotal(text);
  let verdict: ReconciliationVerdict | undefined;
  if (reportedTotal !== undefined) {
    verdict = reconcile(calculatedTotal, reportedTotal, INVOICE_TOLERANCE);
  }

  return { layout: "universal", lines, calculatedTotal, reportedTotal, verdict };
}

// ─── Cantidad / Precio / Importe ──────────────────────────────────────────────

export function extractSimple(
  text: string,
  logger: InvoiceVerifierLogger = silentLogger,
): SimpleAnalysis {
  const lines: ItemLine[] = [];
  let calculatedTotal = 0;

  for (const line of splitLines(text)) {
    const m = line.match(SIMPLE_LINE_RX);
    if (!m) continue;

    const quantity = parseInt(m[1], 10);
    const unitPrice = tryParseNumber(m[2]);
    const lineTotal = tryParseNumber(m[3]);
    if (unitPrice === undefined || lineTotal === undefined) continue;

    const item = itemLine(quantity, unitPrice, lineTotal);
    logLine(logger, item);
    lines.push(item);
    calculatedTotal += lineTotal;
  }

  return { layout: "simple", lines, calculatedTotal };
}

// ─── Precio Neto / Valor Neto / Valor Total ───────────────────────────────────

export function extractNetValue(
  text: string,
  logger: InvoiceVerifierLogger = silentLogger,
): NetValueAnalysis {
  const lines: NetValueLine[] = [];
  let calculatedTotal = 0;
  let calculatedTax = 0;

  for (const line of splitLines(text)) {
    const m = line.match(NET_VALUE_LINE_RX);
    if (!m) continue;

    const quantity = tryParseNumber(m[1]);
    const netPrice = tryParseNumber(m[2]);
    const netWorth = tryParseNumber(m[3]);
    const lineTotal = tryParseNumber(m[4]);
    if (
      quantity === undefined ||
      netPrice === undefined ||
      netWorth === undefined ||
      lineTotal === undefined
    ) {
      continue;
    }

    const computedNetWorth = quantity * netPrice;
    const tax = lineTotal - netWorth;
    calculatedTotal += lineTotal;
    calculatedTax += tax;

    logger.debug(
      `Line: ${quantity} x ${netPrice} = ${computedNetWorth.toFixed(2)} | OCR net worth: ${netWorth.toFixed(2)} | tax: ${tax.toFixed(2)} | total: ${lineTotal.toFixed(2)}`,
    );
    lines.push({
      quantity,
      netPrice,
      netWorth,
      computedNetWorth,
      lineTotal,
      tax,
      // Judged as well as printed; lands in the report's lineVerdicts
      verdict: reconcile(computedNetWorth, netWorth, LINE_TOLERANCE),
    });
  }

  return { layout: "net_value", lines, calculatedTotal, calculatedTax };
}

// ─── Qty / Net Price / Net Worth / VAT / Gross ────────────────────────────────

/**
 * English invoices often wrap a label and its value onto separate lines, so
 * every trigger looks at its own line plus the next one. Later matches
 * overwrite earlier ones.
 */
export function extractEnglish(
  text: string,
  logger: InvoiceVerifierLogger = silentLogger,
): EnglishAnalysis {
  const lines = splitLines(text);
  let quantity: number | undefined;
  let netPrice: number | undefined;
  let netWorth: number | undefined;
  let vatPercent: number | undefined;
  let gross: number | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineClean = line.trim().toLowerCase();
    const windowNums = extractNumericTokens(`${line} ${lines[i + 1] ?? ""}`);
    const first = tryParseNumber(windowNums[0]);
    const last = tryParseNumber(windowNums[windowNums.length - 1]);

    if (lineClean.includes("qty") && first !== undefined) {
      quantity = first;
    }
    if (lineClean.includes("net price") && first !== undefined) {
      netPrice = first;
    }
    if (lineClean.includes("net worth") && first !== undefined) {
      netWorth = first;
    }
    if (lineClean.includes("vat") && lineClean.includes("%")) {
      const percent = tryParseNumber(line.match(VAT_PERCENT_RX)?.[1]);
      if (percent !== undefined) vatPercent = percent;
    }
    // A gross line may list an intermediate value before the gross figure
    if (lineClean.includes("gross") && last !== undefined) {
      gross = last;
    }
  }

  const calculatedNet = netWorth
    ? netWorth
    : quantity && netPrice
      ? quantity * netPrice
      : 0;

  let calculatedVat = 0;
  let vatMethod: VatMethod = "none";
  if (vatPercent && calculatedNet) {
    calculatedVat = (calculatedNet * vatPercent) / 100;
    vatMethod = "percent";
  } else if (gross && calculatedNet) {
    calculatedVat = gross - calculatedNet;
    vatMethod = "gross_difference";
  }
  const calculatedTotal = calculatedNet + calculatedVat;

  logger.debug(
    `Qty: ${quantity} | Net price: ${netPrice} | Net worth: ${netWorth} | VAT %: ${vatPercent} | Gross: ${gross}`,
  );

  return {
    layout: "english",
    quantity,
    netPrice,
    netWorth,
    vatPercent,
    gross,
    calculatedNet,
    calculatedVat,
    vatMethod,
    calculatedTotal,
    verdict:
      gross !== undefined
        ? reconcile(calculatedTotal, gross, INVOICE_TOLERANCE)
        : undefined,
  };
}

// ─── Base Imponible / IVA / IRPF / Total ──────────────────────────────────────

export function extractTaxBreakdown(
  text: string,
  logger: InvoiceVerifierLogger = silentLogger,
): TaxBreakdownAnalysis {
  const base = tryParseNumber(text.match(BASE_RX)?.[1]);
  const iva = tryParseNumber(text.match(IVA_RX)?.[1]);
  const irpf = tryParseNumber(text.match(IRPF_RX)?.[1]);
  const reportedTotal = findReportedTotal(text);

  logger.debug(
    `Base: ${base} | IVA: ${iva} | IRPF: ${irpf} | Reported total: ${reportedTotal}`,
  );

  if (base === undefined) {
    return { layout: "tax_breakdown", base, iva, irpf, reportedTotal };
  }

  const calculatedTotal = base + (iva ?? 0) + (irpf ?? 0);
  return {
    layout: "tax_breakdown",
    base,
    iva,
    irpf,
    reportedTotal,
    calculatedTotal,
    verdict:
      reportedTotal !== undefined
        ? reconcile(calculatedTotal, reportedTotal, INVOICE_TOLERANCE)
        : undefined,
  };
}
