/**
 * InvoiceVerifier – OCR Engine
 *
 * Picks an OCR provider for each image: the preferred one first, then the
 * default chain. A provider that is missing, unavailable or failing hands
 * over to the next one.
 */

import type { InvoiceVerifierLogger } from "../utils/logger";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";
import { TesseractOCR } from "./TesseractOCR";

// ─── Registry ────────────────────────────────────────────────────────────────

const _registry = new Map<string, OCRProvider>([
  ["tesseract", new TesseractOCR()],
]);

const DEFAULT_PROVIDER_ORDER: readonly string[] = ["tesseract"];

/**
 * Register an OCR provider under its `name`, replacing any provider
 * already registered under that name.
 */
export function registerOCRProvider(provider: OCRProvider): void {
  _registry.set(provider.name, provider);
}

export function getOCRProvider(name: string): OCRProvider | undefined {
  return _registry.get(name);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export class OCREngine {
  constructor(
    private readonly logger: InvoiceVerifierLogger,
    private readonly preferredProvider?: string,
  ) {}

  /** Provider names in the order they are tried, without repeats */
  providerOrder(): string[] {
    const names = this.preferredProvider
      ? [this.preferredProvider, ...DEFAULT_PROVIDER_ORDER]
      : DEFAULT_PROVIDER_ORDER;
    return Array.from(new Set(names));
  }

  /**
   * OCR one image. Rejects with the last provider error, or with
   * "No OCR provider available" when nothing could be tried.
   */
  async run(options: OCROptions): Promise<OCRResult> {
    let lastError: Error | undefined;

    for (const name of this.providerOrder()) {
      const provider = _registry.get(name);
      if (!provider) {
        this.logger.debug(`OCR provider '${name}' is not registered – skipping`);
        continue;
      }

      try {
        if (!(await provider.isAvailable())) {
          this.logger.debug(`OCR provider '${name}' is not available – skipping`);
          continue;
        }
        this.logger.info(`Running OCR with provider: ${name}`);
        const result = await provider.extractText(options);
        this.logger.debug(
          `${name}: ${result.lineCount} non-blank line(s), confidence ${result.confidence.toFixed(2)}`,
        );
        return result;
      } catch (err) {
        lastError = toError(err);
        this.logger.warn(`OCR provider '${name}' failed: ${lastError.message}`);
      }
    }

    throw lastError ?? new OCRError("No OCR provider available", "OCREngine");
  }
}
