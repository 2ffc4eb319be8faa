export {
  InvoiceVerifierSDK,
  listInvoiceImages,
  IMAGE_EXTENSIONS,
} from "./InvoiceVerifier";
export type { InvoiceVerifierConfigureOptions } from "./InvoiceVerifier";
export {
  reconcile,
  collectVerdicts,
  LINE_TOLERANCE,
  INVOICE_TOLERANCE,
} from "./reconcile";
export type { CollectedVerdicts } from "./reconcile";
export {
  formatInvoiceReport,
  formatBatchSummary,
  LAYOUT_TITLES,
} from "./formatReport";
export type { FormatOptions } from "./formatReport";
export { validateOptions, InvoiceVerifierError } from "./validator";
export type { ValidationResult, InvoiceVerifierErrorCode } from "./validator";
