/**
 * InvoiceVerifier – OCR invoice arithmetic verification
 *
 * Reads OCR text from Spanish/English invoices, infers the layout, extracts
 * quantity/price/total or base/tax/total figures and checks that they add up.
 *
 * @packageDocumentation
 */

// ─── Primary API ──────────────────────────────────────────────────────────────
export {
  InvoiceVerifierSDK as InvoiceVerifier,
  listInvoiceImages,
  IMAGE_EXTENSIONS,
} from "./core/InvoiceVerifier";
export type { InvoiceVerifierConfigureOptions } from "./core/InvoiceVerifier";

// Schema / types
export type {
  InvoiceLayout,
  InvoiceReport,
  InvoiceAnalysis,
  UniversalAnalysis,
  SimpleAnalysis,
  NetValueAnalysis,
  EnglishAnalysis,
  TaxBreakdownAnalysis,
  ItemLine,
  NetValueLine,
  ReconciliationVerdict,
  VatMethod,
  BatchResult,
  BatchFailure,
  VerifyOptions,
  VerifyDirectoryOptions,
} from "./schema/InvoiceReport";

// OCR layer
export { OCREngine, registerOCRProvider, getOCRProvider } from "./ocr";
export {
  TesseractOCR,
  normaliseLang,
  bundledLanguageFile,
  BUNDLED_MODEL,
  DEFAULT_OCR_LANGUAGE,
} from "./ocr";
export { OCRError } from "./ocr";
export type {
  OCRImage,
  OCRProvider,
  OCROptions,
  OCRResult,
  TesseractOCRConfig,
} from "./ocr";

// Parser layer
export {
  RuleBasedParser,
  parseNumber,
  tryParseNumber,
  extractNumericTokens,
  normaliseOCRText,
  findReportedTotal,
  classifyLayout,
  LAYOUT_RULES,
  OCR_REPLACEMENTS,
  MalformedNumberError,
  extractUniversal,
  extractSimple,
  extractNetValue,
  extractEnglish,
  extractTaxBreakdown,
} from "./parser";
export type { RuleBasedParserOptions, LayoutRule } from "./parser";

// Reconciliation & reporting
export {
  reconcile,
  collectVerdicts,
  LINE_TOLERANCE,
  INVOICE_TOLERANCE,
  formatInvoiceReport,
  formatBatchSummary,
  LAYOUT_TITLES,
} from "./core";
export type { CollectedVerdicts, FormatOptions } from "./core";

// Validation & errors
export { validateOptions, InvoiceVerifierError } from "./core";
export type { ValidationResult, InvoiceVerifierErrorCode } from "./core";

// Logger
export { createLogger, silentLogger } from "./utils/logger";
export type {
  InvoiceVerifierLogger,
  LoggerOptions,
  LogLevel,
} from "./utils/logger";
