/**
 * InvoiceVerifier – Rule-based verification engine
 *
 * rawText → normaliseOCRText → classifyLayout → extractor → reconcile → InvoiceReport
 *
 * Pipeline:
 *   1. Normalise OCR text (lower-case, repair keyword misreads)
 *   2. Classify the layout (fixed, ordered keyword rules)
 *   3. Run the layout's extractor (per-line records and aggregates)
 *   4. Collect line and total verdicts
 */

import type {
  InvoiceAnalysis,
  InvoiceLayout,
  InvoiceReport,
} from "../schema/InvoiceReport";
import type { InvoiceVerifierLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { collectVerdicts } from "../core/reconcile";
import { classifyLayout, normaliseOCRText } from "./primitives";
import {
  extractEnglish,
  extractNetValue,
  extractSimple,
  extractTaxBreakdown,
  extractUniversal,
} from "./extractors";

export interface RuleBasedParserOptions {
  /** Skip classification and force a layout */
  layout?: InvoiceLayout;
  /** File name recorded on the report */
  source?: string;
}

export class RuleBasedParser {
  private readonly logger: InvoiceVerifierLogger;

  constructor(logger: InvoiceVerifierLogger = silentLogger) {
    this.logger = logger;
  }

  parse(rawText: string, options: RuleBasedParserOptions = {}): InvoiceReport {
    const normalizedText = normaliseOCRText(rawText);
    const layout = options.layout ?? classifyLayout(normalizedText);
    this.logger.info(`Layout: ${layout}`);

    const analysis = this.extract(layout, normalizedText);
    const collected = collectVerdicts(analysis);

    const report: InvoiceReport = {
      layout,
      normalizedText,
      analysis,
      ...collected,
    };
    if (options.source !== undefined) report.source = options.source;
    return report;
  }

  private extract(layout: InvoiceLayout, text: string): InvoiceAnalysis {
    switch (layout) {
      case "tax_breakdown":
        return extractTaxBreakdown(text, this.logger);
      case "net_value":
        return extractNetValue(text, this.logger);
      case "simple":
        return extractSimple(text, this.logger);
      case "english":
        return extractEnglish(text, this.logger);
      case "universal":
        return extractUniversal(text, this.logger);
    }
  }
}
