/**
 * InvoiceVerifier – Tesseract.js OCR Provider
 *
 * Offline OCR through tesseract.js. Mixed Spanish/English invoices are read
 * with "spa+eng" unless a language is given.
 *
 * Engine settings (language data location, cache) are fixed when the
 * provider is constructed. Without a `langPath`, language models come from
 * the @tesseract.js-data/<code> packages installed beside tesseract.js.
 */

import { promises as fs } from "fs";
import type { WorkerOptions } from "tesseract.js";
import type { OCROptions, OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";

export const DEFAULT_OCR_LANGUAGE = "spa+eng";

export interface TesseractOCRConfig {
  /** Default language spec when a call gives none */
  language?: string;
  /** Directory or URL holding the *.traineddata.gz files */
  langPath?: string;
  /** Directory to cache language data in; unset disables the cache */
  cachePath?: string;
}

/** Model flavour shipped in each @tesseract.js-data package */
export const BUNDLED_MODEL = "4.0.0_best_int";

interface BundledLanguage {
  code: string;
  data: Buffer;
}

/**
 * Path of the gzipped model in `@tesseract.js-data/<code>`, or `undefined`
 * when that package is not installed.
 */
export function bundledLanguageFile(code: string): string | undefined {
  try {
    return require.resolve(
      `@tesseract.js-data/${code}/${BUNDLED_MODEL}/${code}.traineddata.gz`,
    );
  } catch {
    return undefined;
  }
}

async function loadBundledLanguages(
  lang: string,
  provider: string,
): Promise<BundledLanguage[]> {
  return Promise.all(
    lang.split("+").map(async (code) => {
      const file = bundledLanguageFile(code);
      if (!file) {
        throw new OCRError(
          `No language data for "${code}": install @tesseract.js-data/${code} or set langPath`,
          provider,
        );
      }
      try {
        return { code, data: await fs.readFile(file) };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new OCRError(`Cannot read ${file}: ${reason}`, provider, err);
      }
    }),
  );
}

type TesseractModule = typeof import("tesseract.js");

async function loadTesseract(): Promise<TesseractModule | null> {
  try {
    return await import("tesseract.js");
  } catch {
    return null;
  }
}

// ─── Implementation ──────────────────────────────────────────────────────────

export class TesseractOCR implements OCRProvider {
  readonly name = "tesseract";
  private readonly config: Readonly<TesseractOCRConfig>;

  constructor(config: TesseractOCRConfig = {}) {
    this.config = { ...config };
  }

  async isAvailable(): Promise<boolean> {
    return (await loadTesseract()) !== null;
  }

  async extractText(options: OCROptions): Promise<OCRResult> {
    const tesseract = await loadTesseract();
    if (!tesseract) {
      throw new OCRError("tesseract.js could not be loaded", this.name);
    }

    const lang = normaliseLang(
      options.language ?? this.config.language ?? DEFAULT_OCR_LANGUAGE,
    );
    const langs = this.config.langPath
      ? lang
      : await loadBundledLanguages(lang, this.name);
    let worker: Awaited<ReturnType<TesseractModule["createWorker"]>> | undefined;

    try {
      worker = await tesseract.createWorker(langs, undefined, this.workerOptions());
      const { data } = await worker.recognize(options.image);
      return {
        text: data.text,
        // tesseract.js scores 0–100
        confidence: data.confidence / 100,
        lineCount: data.text.split("\n").filter((l) => l.trim()).length,
        provider: this.name,
      };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new OCRError(`Tesseract recognition failed: ${reason}`, this.name, err);
    } finally {
      await worker?.terminate().catch(() => undefined);
    }
  }

  private workerOptions(): Partial<WorkerOptions> {
    const options: Partial<WorkerOptions> = { logger: () => undefined };
    if (this.config.langPath) options.langPath = this.config.langPath;
    if (this.config.cachePath) {
      options.cachePath = this.config.cachePath;
    } else {
      options.cacheMethod = "none";
    }
    return options;
  }
}

const LANG_MAP: Record<string, string> = {
  en: "eng",
  es: "spa",
  fr: "fra",
  de: "deu",
  pt: "por",
  it: "ita",
  ca: "cat",
};

/**
 * Convert BCP-47 codes to Tesseract codes, part by part:
 * "es+en" → "spa+eng". Tesseract codes pass through.
 */
export function normaliseLang(lang: string): string {
  return lang
    .split("+")
    .map((part) => part.trim().toLowerCase())
    .filter(Boolean)
    .map((part) => LANG_MAP[part] ?? part)
    .join("+");
}
