/**
 * InvoiceVerifier – Main verification API
 *
 * Usage:
 *   import { InvoiceVerifier } from "invoice-verifier";
 *
 *   const report = InvoiceVerifier.verifyText(ocrText);
 *   const batch = await InvoiceVerifier.verifyDirectory({ directory: "images" });
 *
 * Advanced usage:
 *   InvoiceVerifier.configure({
 *     language: "spa+eng",
 *     tesseract: { langPath: "/opt/tessdata" },
 *   });
 */

import { promises as fs } from "fs";
import type { Dirent } from "fs";
import * as path from "path";
import type {
  BatchFailure,
  BatchResult,
  InvoiceReport,
  VerifyDirectoryOptions,
  VerifyOptions,
} from "../schema/InvoiceReport";
import { OCREngine, registerOCRProvider } from "../ocr/OCREngine";
import type { OCRProvider, OCRResult } from "../ocr/OCRProvider";
import { DEFAULT_OCR_LANGUAGE, TesseractOCR } from "../ocr/TesseractOCR";
import type { TesseractOCRConfig } from "../ocr/TesseractOCR";
import { RuleBasedParser } from "../parser/RuleBasedParser";
import { InvoiceVerifierError, validateOptions } from "./validator";
import { createLogger } from "../utils/logger";
import type { InvoiceVerifierLogger } from "../utils/logger";

// ─── Global configuration ─────────────────────────────────────────────────────

interface InvoiceVerifierConfig {
  /** OCR language spec (default: "spa+eng") */
  defaultLanguage: string;
  /** Print debug/info logs (default: false) */
  debug: boolean;
  /** Send every log line to stderr (default: false) */
  logToStderr: boolean;
  /** Provider tried before the default chain */
  ocrProvider?: string;
}

const DEFAULT_CONFIG: Readonly<InvoiceVerifierConfig> = {
  defaultLanguage: DEFAULT_OCR_LANGUAGE,
  debug: false,
  logToStderr: false,
};

let _config: InvoiceVerifierConfig = { ...DEFAULT_CONFIG };

export interface InvoiceVerifierConfigureOptions {
  language?: string;
  debug?: boolean;
  logToStderr?: boolean;
  /** A provider instance is registered first; a name selects a registered one */
  ocrProvider?: OCRProvider | string;
  /** Re-register the built-in Tesseract provider with these settings */
  tesseract?: TesseractOCRConfig;
}

/** Image extensions picked up by `verifyDirectory` (case-insensitive) */
export const IMAGE_EXTENSIONS: readonly string[] = Object.freeze([
  ".png",
  ".jpg",
  ".jpeg",
]);

// A symlink counts when its target is a file. One that cannot be resolved is
// listed and fails when the batch reaches it.
async function isImageFile(directory: string, entry: Dirent): Promise<boolean> {
  if (!IMAGE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
    return false;
  }
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  return fs.stat(path.join(directory, entry.name)).then(
    (stats) => stats.isFile(),
    () => true,
  );
}

/**
 * Image file names in `directory`, sorted so batches run in a stable order.
 */
export async function listInvoiceImages(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const keep = await Promise.all(entries.map((e) => isImageFile(directory, e)));
  return entries
    .filter((_, i) => keep[i])
    .map((e) => e.name)
    .sort();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── InvoiceVerifier namespace ────────────────────────────────────────────────

export const InvoiceVerifierSDK = {
  /**
   * Set process-wide defaults and register providers.
   * Call once at startup, before any verification.
   */
  configure(options: InvoiceVerifierConfigureOptions): void {
    const validation = validateOptions({
      language: options.language,
      ocrProvider:
        typeof options.ocrProvider === "string"
          ? options.ocrProvider
          : undefined,
    });
    if (!validation.valid) {
      throw new InvoiceVerifierError(
        `Invalid configuration: ${validation.errors.join("; ")}`,
        "INVALID_INPUT",
      );
    }

    if (options.language !== undefined) {
      _config.defaultLanguage = options.language;
    }
    if (options.debug !== undefined) {
      _config.debug = options.debug;
    }
    if (options.logToStderr !== undefined) {
      _config.logToStderr = options.logToStderr;
    }
    if (options.tesseract) {
      registerOCRProvider(new TesseractOCR(options.tesseract));
    }
    if (typeof options.ocrProvider === "string") {
      _config.ocrProvider = options.ocrProvider;
    } else if (options.ocrProvider) {
      registerOCRProvider(options.ocrProvider);
      _config.ocrProvider = options.ocrProvider.name;
    }
  },

  /** Restore the defaults. Registered providers stay registered. */
  resetConfiguration(): void {
    _config = { ...DEFAULT_CONFIG };
  },

  /**
   * Verify text that has already been transcribed. Synchronous; no OCR.
   */
  verifyText(
    rawText: string,
    options: { source?: string; debug?: boolean } = {},
  ): InvoiceReport {
    const logger = this.logger(options.debug);
    return new RuleBasedParser(logger).parse(rawText, {
      source: options.source,
    });
  },

  /**
   * OCR one invoice image and verify it.
   *
   * @throws InvoiceVerifierError – `INVALID_INPUT` or `OCR_FAILED`
   */
  async verifyImage(
    imagePath: string,
    options: VerifyOptions = {},
  ): Promise<InvoiceReport> {
    const validation = validateOptions(options);
    if (!validation.valid) {
      throw new InvoiceVerifierError(
        `Invalid options: ${validation.errors.join("; ")}`,
        "INVALID_INPUT",
      );
    }

    const logger = this.logger(options.debug);
    const source = path.basename(imagePath);
    const ocrEngine = new OCREngine(
      this.logger(options.debug, "ocr"),
      options.ocrProvider ?? _config.ocrProvider,
    );

    logger.info(`Processing ${source}`);
    let ocrResult: OCRResult;
    try {
      ocrResult = await ocrEngine.run({
        image: imagePath,
        language: options.language ?? _config.defaultLanguage,
      });
    } catch (err) {
      throw new InvoiceVerifierError(
        `OCR extraction failed for ${source}: ${errorMessage(err)}`,
        "OCR_FAILED",
        err,
      );
    }

    const report = this.verifyText(ocrResult.text, {
      source,
      debug: options.debug,
    });
    report.ocrProvider = ocrResult.provider;
    return report;
  },

  /**
   * Verify every invoice image in a directory, one at a time. A failing
   * image is recorded under `failures` and the batch carries on.
   *
   * @throws InvoiceVerifierError – `INVALID_INPUT` when the directory is
   *   missing or unreadable
   */
  async verifyDirectory(options: VerifyDirectoryOptions): Promise<BatchResult> {
    const validation = validateOptions(options);
    if (!validation.valid) {
      throw new InvoiceVerifierError(
        `Invalid options: ${validation.errors.join("; ")}`,
        "INVALID_INPUT",
      );
    }

    const logger = this.logger(options.debug);
    let files: string[];
    try {
      files = await listInvoiceImages(options.directory);
    } catch (err) {
      throw new InvoiceVerifierError(
        `Cannot read directory ${options.directory}: ${errorMessage(err)}`,
        "INVALID_INPUT",
        err,
      );
    }
    logger.info(`Found ${files.length} invoice image(s) in ${options.directory}`);

    const reports: InvoiceReport[] = [];
    const failures: BatchFailure[] = [];

    for (const file of files) {
      try {
        reports.push(
          await this.verifyImage(path.join(options.directory, file), options),
        );
      } catch (err) {
        logger.error(`Failed to verify ${file}: ${errorMessage(err)}`);
        failures.push({ source: file, error: errorMessage(err) });
      }
    }

    return { reports, failures };
  },

  // ─── Helpers ────────────────────────────────────────────────────────────────

  logger(debug?: boolean, scope?: string): InvoiceVerifierLogger {
    return createLogger({
      enabled: debug ?? _config.debug,
      stderr: _config.logToStderr,
      scope,
    });
  },
};
