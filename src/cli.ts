#!/usr/bin/env node
/**
 * InvoiceVerifier – command line entry point
 *
 *   invoice-verifier <directory> [--lang spa+eng] [--provider name] [--json] [--debug]
 *   invoice-verifier --text <file> [--json] [--debug]
 */

import { promises as fs } from "fs";
import * as path from "path";
import { InvoiceVerifierSDK as InvoiceVerifier } from "./core/InvoiceVerifier";
import { formatBatchSummary, formatInvoiceReport } from "./core/formatReport";
import { InvoiceVerifierError } from "./core/validator";
import type { BatchResult } from "./schema/InvoiceReport";
import { createLogger } from "./utils/logger";

export const USAGE = [
  "Usage: invoice-verifier <directory> [options]",
  "       invoice-verifier --text <file> [options]",
  "",
  "Options:",
  "  --lang <spec>       OCR language spec (default: spa+eng)",
  "  --provider <name>   OCR provider to try first",
  "  --text <file>       Verify an already-transcribed text file (no OCR)",
  "  --json              Print the structured result as JSON",
  "  --debug             Verbose logging (also INVOICE_VERIFIER_DEBUG=1)",
  "  -h, --help          Show this help",
].join("\n");

export interface CliArgs {
  directory?: string;
  textFile?: string;
  language?: string;
  provider?: string;
  json: boolean;
  debug: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Set(["--lang", "--provider", "--text"]);

export function parseArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): CliArgs {
  const args: CliArgs = {
    json: false,
    debug: env.INVOICE_VERIFIER_DEBUG === "1" || env.INVOICE_VERIFIER_DEBUG === "true",
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new InvoiceVerifierError(`${arg} needs a value`, "INVALID_INPUT");
      }
      i++;
      if (arg === "--lang") args.language = value;
      else if (arg === "--provider") args.provider = value;
      else args.textFile = value;
    } else if (arg === "--json") {
      args.json = true;
    } else if (arg === "--debug") {
      args.debug = true;
    } else if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else if (arg.startsWith("-")) {
      throw new InvoiceVerifierError(`Unknown option: ${arg}`, "INVALID_INPUT");
    } else if (args.directory === undefined) {
      args.directory = arg;
    } else {
      throw new InvoiceVerifierError(
        `Unexpected argument: ${arg}`,
        "INVALID_INPUT",
      );
    }
  }

  return args;
}

/**
 * Run the CLI. Resolves to the process exit code: 0 when the run completed
 * (mismatches included), 1 on bad input.
 */
export async function main(argv: string[]): Promise<number> {
  const logger = createLogger(false);
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (!args.directory && !args.textFile) {
    console.error(USAGE);
    return 1;
  }

  try {
    InvoiceVerifier.configure({
      debug: args.debug,
      logToStderr: args.json,
      language: args.language,
      ocrProvider: args.provider,
    });

    if (args.textFile) {
      const text = await fs.readFile(args.textFile, "utf8");
      const report = InvoiceVerifier.verifyText(text, {
        source: path.basename(args.textFile),
      });
      console.log(
        args.json ? JSON.stringify(report, null, 2) : formatInvoiceReport(report),
      );
      return 0;
    }

    const batch: BatchResult = await InvoiceVerifier.verifyDirectory({
      directory: args.directory ?? "",
    });
    if (args.json) {
      console.log(JSON.stringify(batch, null, 2));
    } else {
      for (const report of batch.reports) {
        console.log(formatInvoiceReport(report));
        console.log("");
      }
      console.log(formatBatchSummary(batch));
    }
    return 0;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
