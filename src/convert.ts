import { classifyInput, resolveOutputPath } from "./input.js";
import { assembleMarkdown } from "./markdown.js";
import type { OcrClient } from "./providers/mistral.js";
import { submitDocument } from "./submit.js";
import { writeText } from "./util/io.js";
import type { ConversionResult, Logger } from "./types.js";

export type ConvertOptions = {
  input: string;
  output?: string;
  includeImages?: boolean;
  model?: string;
  signedUrlExpirySeconds?: number;
  deleteUploaded?: boolean;
};

export type ConvertDeps = {
  client: OcrClient;
  logger: Logger;
  now?: () => number;
};

export async function convertPdfToMarkdown(opts: ConvertOptions, deps: ConvertDeps): Promise<ConversionResult> {
  const { logger } = deps;
  const includeImages = opts.includeImages ?? true;

  logger.info("Starting PDF to markdown conversion");

  const spec = classifyInput(opts.input);
  const outputPath = resolveOutputPath(spec, opts.output);
  logger.debug("Input classified", { kind: spec.kind, output_path: outputPath });

  const ocr = await submitDocument(deps.client, spec, {
    includeImages,
    logger,
    model: opts.model,
    signedUrlExpirySeconds: opts.signedUrlExpirySeconds,
    deleteUploaded: opts.deleteUploaded,
    now: deps.now,
  });

  logger.info("Generating markdown", { pages: ocr.pages.length });
  const markdown = assembleMarkdown(ocr, { includeImages });

  const bytesWritten = await writeText(outputPath, markdown);
  logger.info("Markdown file created", { output_path: outputPath });

  return { inputKind: spec.kind, outputPath, pageCount: ocr.pages.length, bytesWritten };
}

export { classifyInput, resolveOutputPath, defaultOutputPath, isUrl } from "./input.js";
export { assembleMarkdown, replaceImagePlaceholders, PAGE_SEPARATOR } from "./markdown.js";
export { submitDocument, DEFAULT_SIGNED_URL_EXPIRY_SECONDS } from "./submit.js";
export { createMistralOcrClient, DEFAULT_OCR_MODEL, type OcrClient } from "./providers/mistral.js";
export * from "./errors.js";
export type * from "./types.js";
