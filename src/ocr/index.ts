export { OCREngine, registerOCRProvider, getOCRProvider } from "./OCREngine";
export {
  TesseractOCR,
  normaliseLang,
  bundledLanguageFile,
  BUNDLED_MODEL,
  DEFAULT_OCR_LANGUAGE,
} from "./TesseractOCR";
export type { TesseractOCRConfig } from "./TesseractOCR";
export type { OCRImage, OCRProvider, OCROptions, OCRResult } from "./OCRProvider";
export { OCRError } from "./OCRProvider";
