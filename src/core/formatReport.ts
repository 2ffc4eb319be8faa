/**
 * InvoiceVerifier – Human-readable report rendering
 */

import type {
  BatchResult,
  InvoiceLayout,
  InvoiceReport,
  ItemLine,
  ReconciliationVerdict,
} from "../schema/InvoiceReport";

const OK = "✔";
const FAIL = "✘";

export const LAYOUT_TITLES: Record<InvoiceLayout, string> = {
  tax_breakdown: "INVOICE WITH TAXES (Base Imponible / IVA / IRPF)",
  net_value: "INVOICE (Precio Neto / Valor Neto)",
  simple: "SIMPLE INVOICE (Cantidad / Precio / Importe)",
  english: "INVOICE (English)",
  universal: "UNIVERSAL INVOICE (Fallback)",
};

export interface FormatOptions {
  /** Print the normalised OCR text above the analysis (default: true) */
  includeText?: boolean;
}

const money = (n: number): string => n.toFixed(2);
const maybe = (n: number | undefined): string =>
  n === undefined ? "-" : String(n);
const mark = (verdict: ReconciliationVerdict | undefined): string =>
  verdict?.match ? OK : FAIL;

function itemLine(line: ItemLine): string {
  return `Line: ${line.quantity} x ${line.unitPrice} = ${money(line.computed)} | OCR amount: ${money(line.lineTotal)} | ${mark(line.verdict)}`;
}

/**
 * Render one report as the diagnostic block printed per invoice.
 */
export function formatInvoiceReport(
  report: InvoiceReport,
  options: FormatOptions = {},
): string {
  const out: string[] = [];
  if (report.source) out.push(`=== ${report.source} ===`);
  if (options.includeText ?? true) {
    out.push("--- NORMALIZED OCR TEXT ---", report.normalizedText.trim(), "");
  }
  out.push(`--- ${LAYOUT_TITLES[report.layout]} ---`);

  const a = report.analysis;
  switch (a.layout) {
    case "universal":
      out.push(...a.lines.map(itemLine), "");
      out.push(
        a.verdict && a.reportedTotal !== undefined
          ? `OCR TOTAL: ${money(a.reportedTotal)} | Calculated: ${money(a.calculatedTotal)} | ${mark(a.verdict)}`
          : `TOTAL CALCULATED: ${money(a.calculatedTotal)}`,
      );
      break;
    case "simple":
      out.push(...a.lines.map(itemLine), "");
      out.push(`TOTAL CALCULATED: ${money(a.calculatedTotal)}`);
      break;
    case "net_value":
      for (const l of a.lines) {
        out.push(
          `Line: ${l.quantity} x ${l.netPrice} = ${money(l.computedNetWorth)} | OCR net worth: ${money(l.netWorth)} | Tax: ${money(l.tax)} | Line total: ${money(l.lineTotal)} | ${mark(l.verdict)}`,
        );
      }
      out.push(
        "",
        `TOTAL CALCULATED: ${money(a.calculatedTotal)} | TAX CALCULATED: ${money(a.calculatedTax)}`,
      );
      break;
    case "english":
      out.push(
        `Qty: ${maybe(a.quantity)}`,
        `Net price: ${maybe(a.netPrice)}`,
        `Net worth: ${maybe(a.netWorth)}`,
        `VAT (%): ${maybe(a.vatPercent)} → ${money(a.calculatedVat)}`,
        `Gross (OCR): ${maybe(a.gross)}`,
        `TOTAL CALCULATED: ${money(a.calculatedTotal)} | ${mark(a.verdict)}`,
      );
      break;
    case "tax_breakdown":
      out.push(
        `Base imponible: ${maybe(a.base)}`,
        `IVA: ${maybe(a.iva)}`,
        `IRPF: ${maybe(a.irpf)}`,
        `OCR TOTAL: ${maybe(a.reportedTotal)}`,
      );
      if (a.calculatedTotal !== undefined) {
        out.push(
          `TOTAL CALCULATED (Base+IVA+IRPF): ${money(a.calculatedTotal)} | ${mark(a.verdict)}`,
        );
      }
      break;
  }

  return out.join("\n");
}

/**
 * One-paragraph summary of a directory run, failures listed last.
 */
export function formatBatchSummary(batch: BatchResult): string {
  let matched = 0;
  let mismatched = 0;
  let unverified = 0;
  for (const r of batch.reports) {
    if (!r.totalVerdict) unverified++;
    else if (r.totalVerdict.match) matched++;
    else mismatched++;
  }

  const processed = batch.reports.length + batch.failures.length;
  const out = [
    `Processed ${processed} invoice(s): ${matched} matched, ${mismatched} mismatched, ${unverified} without total check, ${batch.failures.length} failed`,
  ];
  for (const f of batch.failures) {
    out.push(`FAILED ${f.source}: ${f.error}`);
  }
  return out.join("\n");
}
