import { Command, CommanderError, InvalidArgumentError } from "commander";
import { convertPdfToMarkdown } from "./convert.js";
import { ConfigurationError, PdfToMarkdownError, errorMessage } from "./errors.js";
import { createMistralOcrClient, DEFAULT_OCR_MODEL, type OcrClient } from "./providers/mistral.js";
import { DEFAULT_SIGNED_URL_EXPIRY_SECONDS } from "./submit.js";
import { resolveApiKey } from "./util/credentials.js";
import { createConsoleLogger } from "./util/logger.js";
import { mergeRunConfig, readRunConfig, type RunConfig } from "./util/runConfig.js";
import type { Logger } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

type CliOptions = {
  output?: string;
  apiKey?: string;
  inlineImages?: boolean;
  model?: string;
  signedUrlExpiry?: number;
  deleteUploaded?: boolean;
  config?: string;
  verbose?: boolean;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  createClient?: (apiKey: string) => OcrClient;
  createLogger?: (verbose: boolean) => Logger;
  writeOut?: (s: string) => void;
  writeErr?: (s: string) => void;
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive whole number of seconds.");
  return n;
}

function buildProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("pdf2md")
    .description("Convert a PDF file or URL to markdown using Mistral's OCR API.")
    .version("0.1.0")
    .argument("[input]", "Local PDF file path or URL pointing to a PDF")
    .option("-o, --output <path>", "Output markdown file path (default: input name with .md extension)")
    .option("-k, --api-key <key>", "Mistral API key (default: MISTRAL_API_KEY environment variable)")
    .option("--inline-images", "Include images inline as base64 data URLs (default)")
    .option("--no-inline-images", "Leave image placeholders as plain references")
    .option("-m, --model <name>", `OCR model (default: ${DEFAULT_OCR_MODEL})`)
    .option(
      "--signed-url-expiry <seconds>",
      `Validity window of the signed URL for uploaded files (default: ${DEFAULT_SIGNED_URL_EXPIRY_SECONDS})`,
      parsePositiveInt,
    )
    .option("--delete-uploaded", "Delete the uploaded file from the OCR service after processing")
    .option("--config <path>", "JSON config file containing run options")
    .option("-v, --verbose", "Enable verbose logging", false)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: deps.writeOut ?? ((s) => process.stdout.write(s)),
      writeErr: deps.writeErr ?? ((s) => process.stderr.write(s)),
    });

  return program;
}

async function resolveRunConfig(input: string | undefined, opts: CliOptions): Promise<RunConfig> {
  const cli = {
    input,
    output: opts.output,
    model: opts.model,
    inlineImages: opts.inlineImages,
    signedUrlExpirySeconds: opts.signedUrlExpiry,
    deleteUploaded: opts.deleteUploaded,
  };
  const cfg = opts.config ? await readRunConfig(opts.config) : {};
  return mergeRunConfig(cli, cfg);
}

/** Parses `args` (without the node/script prefix), runs one conversion and returns the exit status. */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram(deps);

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    throw e;
  }

  const opts = program.opts<CliOptions>();
  const verbose = Boolean(opts.verbose);
  const logger = (deps.createLogger ?? ((v) => createConsoleLogger({ verbose: v })))(verbose);

  let run: RunConfig;
  try {
    run = await resolveRunConfig(program.args[0], opts);
  } catch (e) {
    logger.error(errorMessage(e));
    return EXIT_USAGE;
  }

  if (!run.input) {
    logger.error("Missing required input. Provide a PDF path or URL, or set \"input\" in --config.");
    return EXIT_USAGE;
  }

  try {
    const apiKey = resolveApiKey(opts.apiKey, deps.env ?? process.env);
    const client = (deps.createClient ?? ((key) => createMistralOcrClient({ apiKey: key })))(apiKey);

    const result = await convertPdfToMarkdown(
      {
        input: run.input,
        output: run.output,
        includeImages: run.inlineImages ?? true,
        model: run.model,
        signedUrlExpirySeconds: run.signedUrlExpirySeconds,
        deleteUploaded: run.deleteUploaded ?? false,
      },
      { client, logger },
    );
    logger.debug("Conversion finished", { pages: result.pageCount, bytes: result.bytesWritten });
    return EXIT_OK;
  } catch (e) {
    if (e instanceof ConfigurationError) {
      logger.error(e.message);
      return EXIT_FAILURE;
    }
    logger.error("Error occurred", { error: errorMessage(e), type: e instanceof PdfToMarkdownError ? e.name : undefined });
    if (verbose && e instanceof Error) {
      if (e.stack) logger.debug(e.stack);
      if (e.cause !== undefined) logger.debug("Caused by", { cause: errorMessage(e.cause) });
    }
    return EXIT_FAILURE;
  }
}
