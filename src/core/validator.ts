/**
 * InvoiceVerifier – Input validation and typed errors
 */

import type {
  VerifyDirectoryOptions,
  VerifyOptions,
} from "../schema/InvoiceReport";

// ─── Input validation ─────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// "spa+eng", "es", "chi_sim"
const LANGUAGE_SPEC_RX = /^[a-z_]{2,10}(?:\+[a-z_]{2,10})*$/i;

export function validateOptions(
  options: VerifyOptions | VerifyDirectoryOptions,
): ValidationResult {
  const errors: string[] = [];

  if ("directory" in options) {
    if (typeof options.directory !== "string" || !options.directory.trim()) {
      errors.push("`directory` must be a non-empty path.");
    }
  }

  if (
    options.language !== undefined &&
    !LANGUAGE_SPEC_RX.test(options.language)
  ) {
    errors.push(
      "`language` must be one or more language codes joined by '+', e.g. \"spa+eng\".",
    );
  }

  if (
    options.ocrProvider !== undefined &&
    (typeof options.ocrProvider !== "string" || !options.ocrProvider.trim())
  ) {
    errors.push("`ocrProvider` must be a non-empty provider name.");
  }

  return { valid: errors.length === 0, errors };
}

// ─── Typed error ──────────────────────────────────────────────────────────────

export type InvoiceVerifierErrorCode =
  | "INVALID_INPUT"
  | "OCR_FAILED"
  | "PARSE_FAILED"
  | "UNKNOWN";

export class InvoiceVerifierError extends Error {
  constructor(
    message: string,
    public readonly code: InvoiceVerifierErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InvoiceVerifierError";
  }
}
