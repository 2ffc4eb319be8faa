/**
 * InvoiceVerifier – Arithmetic reconciliation
 *
 * Compares values implied by arithmetic against values read by OCR.
 * Tolerances are fixed: 0.5 per line, 1.0 per invoice.
 */

import type {
  InvoiceAnalysis,
  ReconciliationVerdict,
} from "../schema/InvoiceReport";

export const LINE_TOLERANCE = 0.5;
export const INVOICE_TOLERANCE = 1.0;

export function reconcile(
  expected: number,
  actual: number,
  tolerance: number,
): ReconciliationVerdict {
  const difference = Math.abs(expected - actual);
  return {
    expected,
    actual,
    difference,
    tolerance,
    match: difference < tolerance,
  };
}

export interface CollectedVerdicts {
  lineVerdicts: ReconciliationVerdict[];
  totalVerdict?: ReconciliationVerdict;
  calculatedTotal?: number;
  reportedTotal?: number;
}

/**
 * Flatten a layout-specific analysis into the verdicts every report carries.
 */
export function collectVerdicts(analysis: InvoiceAnalysis): CollectedVerdicts {
  switch (analysis.layout) {
    case "universal":
      return {
        lineVerdicts: analysis.lines.map((l) => l.verdict),
        totalVerdict: analysis.verdict,
        calculatedTotal: analysis.calculatedTotal,
        reportedTotal: analysis.reportedTotal,
      };
    case "simple":
      return {
        lineVerdicts: analysis.lines.map((l) => l.verdict),
        calculatedTotal: analysis.calculatedTotal,
      };
    case "net_value":
      return {
        lineVerdicts: analysis.lines.map((l) => l.verdict),
        calculatedTotal: analysis.calculatedTotal,
      };
    case "english":
      return {
        lineVerdicts: [],
        totalVerdict: analysis.verdict,
        calculatedTotal: analysis.calculatedTotal,
        reportedTotal: analysis.gross,
      };
    case "tax_breakdown":
      return {
        lineVerdicts: [],
        totalVerdict: analysis.verdict,
        calculatedTotal: analysis.calculatedTotal,
        reportedTotal: analysis.reportedTotal,
      };
  }
}
