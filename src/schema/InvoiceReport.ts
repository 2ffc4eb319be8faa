/**
 * InvoiceVerifier – Canonical report schema
 *
 * Typed output contract for every verification pass, regardless of which
 * invoice layout was inferred or which OCR provider produced the text.
 */

// ─── Layouts ────────────────────────────────────────────────────────────────

export type InvoiceLayout =
  | "tax_breakdown"
  | "net_value"
  | "simple"
  | "english"
  | "universal";

// ─── Verdicts ───────────────────────────────────────────────────────────────

export interface ReconciliationVerdict {
  /** Value implied by arithmetic */
  expected: number;
  /** Value read by OCR */
  actual: number;
  /** |expected − actual| */
  difference: number;
  tolerance: number;
  match: boolean;
}

// ─── Line records ───────────────────────────────────────────────────────────

/** Quantity × price = line total rows (universal and simple layouts) */
export interface ItemLine {
  quantity: number;
  unitPrice: number;
  lineTotal: number;
  computed: number;
  verdict: ReconciliationVerdict;
}

/** Precio neto / valor neto / valor total rows */
export interface NetValueLine {
  quantity: number;
  netPrice: number;
  netWorth: number;
  computedNetWorth: number;
  lineTotal: number;
  /** lineTotal − netWorth */
  tax: number;
  verdict: ReconciliationVerdict;
}

// ─── Per-layout analyses ────────────────────────────────────────────────────

export interface UniversalAnalysis {
  layout: "universal";
  lines: ItemLine[];
  calculatedTotal: number;
  reportedTotal?: number;
  verdict?: ReconciliationVerdict;
}

export interface SimpleAnalysis {
  layout: "simple";
  lines: ItemLine[];
  calculatedTotal: number;
}

export interface NetValueAnalysis {
  layout: "net_value";
  lines: NetValueLine[];
  calculatedTotal: number;
  calculatedTax: number;
}

export type VatMethod = "percent" | "gross_difference" | "none";

export interface EnglishAnalysis {
  layout: "english";
  quantity?: number;
  netPrice?: number;
  netWorth?: number;
  vatPercent?: number;
  gross?: number;
  calculatedNet: number;
  calculatedVat: number;
  vatMethod: VatMethod;
  calculatedTotal: number;
  verdict?: ReconciliationVerdict;
}

export interface TaxBreakdownAnalysis {
  layout: "tax_breakdown";
  base?: number;
  iva?: number;
  irpf?: number;
  reportedTotal?: number;
  /** Undefined when no taxable base was found */
  calculatedTotal?: number;
  verdict?: ReconciliationVerdict;
}

export type InvoiceAnalysis =
  | UniversalAnalysis
  | SimpleAnalysis
  | NetValueAnalysis
  | EnglishAnalysis
  | TaxBreakdownAnalysis;

// ─── Report ─────────────────────────────────────────────────────────────────

export interface InvoiceReport {
  /** File name the text came from, when known */
  source?: string;
  layout: InvoiceLayout;
  normalizedText: string;
  analysis: InvoiceAnalysis;
  lineVerdicts: ReconciliationVerdict[];
  totalVerdict?: ReconciliationVerdict;
  calculatedTotal?: number;
  reportedTotal?: number;
  /** OCR provider that produced the text */
  ocrProvider?: string;
}

export interface BatchFailure {
  source: string;
  error: string;
}

export interface BatchResult {
  reports: InvoiceReport[];
  failures: BatchFailure[];
}

// ─── Options ────────────────────────────────────────────────────────────────

export interface VerifyOptions {
  /** Tesseract language spec, e.g. "spa+eng" */
  language?: string;
  /** Name of a registered OCR provider to try first */
  ocrProvider?: string;
  /** Enable debug/info logging */
  debug?: boolean;
}

export interface VerifyDirectoryOptions extends VerifyOptions {
  directory: string;
}
