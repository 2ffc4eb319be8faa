export { RuleBasedParser } from "./RuleBasedParser";
export type { RuleBasedParserOptions } from "./RuleBasedParser";
export {
  parseNumber,
  tryParseNumber,
  extractNumericTokens,
  normaliseOCRText,
  findReportedTotal,
  classifyLayout,
  LAYOUT_RULES,
  OCR_REPLACEMENTS,
  MalformedNumberError,
} from "./primitives";
export type { LayoutRule } from "./primitives";
export {
  extractUniversal,
  extractSimple,
  extractNetValue,
  extractEnglish,
  extractTaxBreakdown,
} from "./extractors";
