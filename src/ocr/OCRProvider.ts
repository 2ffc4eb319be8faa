/**
 * InvoiceVerifier – OCR Provider abstraction
 *
 * OCR is a black box to the verifier: an image goes in, raw text comes out.
 * Register any engine that implements `OCRProvider`.
 */

/** Path to an image file, or its encoded bytes */
export type OCRImage = string | Buffer;

export interface OCRResult {
  /** Raw recognised text, line breaks kept */
  text: string;
  /** 0–1; 0 when the engine gives no estimate */
  confidence: number;
  /** Non-blank lines in `text` */
  lineCount: number;
  /** Provider that produced the text */
  provider: string;
}

export interface OCROptions {
  image: OCRImage;
  /** Tesseract language spec, e.g. "spa+eng" */
  language?: string;
}

export interface OCRProvider {
  /** Registry key */
  readonly name: string;

  /** Rejects with `OCRError` when recognition fails */
  extractText(options: OCROptions): Promise<OCRResult>;

  /** Whether the engine can run in this process */
  isAvailable(): Promise<boolean>;
}

export class OCRError extends Error {
  readonly provider: string;
  readonly cause?: unknown;

  constructor(message: string, provider: string, cause?: unknown) {
    super(`[${provider}] ${message}`);
    this.name = "OCRError";
    this.provider = provider;
    this.cause = cause;
  }
}
