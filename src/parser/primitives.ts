/**
 * InvoiceVerifier – Rule-based parser primitives
 *
 * Number normalisation, OCR keyword repair, reported-total lookup and
 * layout classification shared by every extractor.
 * No external dependencies – pure TypeScript.
 */

import type { InvoiceLayout } from "../schema/InvoiceReport";

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown by `parseNumber` when a token is not a decimal after separator
 * clean-up. Extractors catch it and skip the offending line or field.
 */
export class MalformedNumberError extends Error {
  constructor(public readonly token: string) {
    super(`Malformed number: "${token}"`);
    this.name = "MalformedNumberError";
  }
}

// ─── Regex pattern library ────────────────────────────────────────────────────

export const PATTERNS = {
  // Any numeric token with an optional single separator group: 12, 12,5, 1.451
  NUMBER: /\d+(?:[.,]\d+)?/g,

  // Grouped thousands with no decimal part: 1.451, 12.345, 1.234.567
  GROUPED_THOUSANDS: /^\d{1,3}(\.\d{3})+$/,

  // "total" label followed by a two-decimal amount, e.g. "total: 1.234,56"
  REPORTED_TOTAL: /totals?[^\d]*(\d{1,3}(?:[.,]\d{3})*[.,]\d{2})/g,

  // dd/mm/yyyy, d-m-yy …
  DATE_DMY: /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/,

  // Only what parseFloat would read end-to-end
  DECIMAL: /^-?(?:\d+\.?\d*|\.\d+)$/,

  // Currency symbols, whitespace and plus signs
  STRIP: /[€$£\s+]/g,
};

// ─── Number parsing ───────────────────────────────────────────────────────────

/**
 * Parse an OCR numeric token into a canonical amount.
 *
 * "1.234,56" → 1234.56, "12,5" → 12.5, "1.451" → 1451, "1234.56" → 1234.56.
 * A lone dot followed by exactly three digits is read as a thousands group,
 * so "1.234" is 1234.
 */
export function parseNumber(token: string): number {
  let num = token.trim();
  const hasComma = num.includes(",");
  const hasDot = num.includes(".");

  if (hasComma && hasDot) {
    num = num.replace(/\./g, "").replace(/,/g, ".");
  } else if (hasComma) {
    num = num.replace(/,/g, ".");
  } else if (hasDot && PATTERNS.GROUPED_THOUSANDS.test(num)) {
    num = num.replace(/\./g, "");
  }

  num = num.replace(PATTERNS.STRIP, "");

  if (!PATTERNS.DECIMAL.test(num)) {
    throw new MalformedNumberError(token);
  }
  const value = parseFloat(num);
  if (!Number.isFinite(value)) {
    throw new MalformedNumberError(token);
  }
  return value;
}

/** `parseNumber` that yields `undefined` instead of throwing */
export function tryParseNumber(token: string | undefined): number | undefined {
  if (token === undefined) return undefined;
  try {
    return parseNumber(token);
  } catch (err) {
    if (err instanceof MalformedNumberError) return undefined;
    throw err;
  }
}

/** All numeric tokens of `text`, in document order */
export function extractNumericTokens(text: string): string[] {
  return text.match(PATTERNS.NUMBER) ?? [];
}

// ─── OCR text normalization ───────────────────────────────────────────────────

/** Known OCR misreads of the keywords the classifier and extractors look for */
export const OCR_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["precioneto", "precio neto"],
  ["valorneto", "valor neto"],
  ["imporie", "importe"],
  ["imporle", "importe"],
  ["cantldad", "cantidad"],
  ["totai", "total"],
];

/**
 * Lower-case OCR text and repair known keyword misreads.
 */
export function normaliseOCRText(raw: string): string {
  let t = raw.toLowerCase();
  for (const [wrong, right] of OCR_REPLACEMENTS) {
    t = t.split(wrong).join(right);
  }
  return t;
}

// ─── Reported total ───────────────────────────────────────────────────────────

/**
 * The invoice's self-declared total: the last "total"-labelled two-decimal
 * amount in the text. Returns `undefined` when there is none.
 */
export function findReportedTotal(text: string): number | undefined {
  const matches = Array.from(
    text.toLowerCase().matchAll(PATTERNS.REPORTED_TOTAL),
  );
  const last = matches[matches.length - 1];
  return tryParseNumber(last?.[1]);
}

// ─── Layout classification ────────────────────────────────────────────────────

export interface LayoutRule {
  layout: InvoiceLayout;
  test: (text: string) => boolean;
}

const hasAll =
  (...keywords: string[]) =>
  (text: string): boolean =>
    keywords.every((kw) => text.includes(kw));

const hasAny =
  (...keywords: string[]) =>
  (text: string): boolean =>
    keywords.some((kw) => text.includes(kw));

/** Evaluated in order; the first rule that matches wins */
export const LAYOUT_RULES: readonly LayoutRule[] = [
  { layout: "tax_breakdown", test: hasAll("base imponible", "iva") },
  { layout: "net_value", test: hasAll("precio neto", "valor neto") },
  { layout: "simple", test: hasAll("cantidad", "precio", "importe") },
  { layout: "english", test: hasAny("qty", "net price") },
];

/**
 * Pick the extraction layout for normalised text.
 * Always returns a layout: text no rule accepts is "universal".
 */
export function classifyLayout(text: string): InvoiceLayout {
  for (const rule of LAYOUT_RULES) {
    if (rule.test(text)) return rule.layout;
  }
  return "universal";
}
