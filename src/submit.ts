import path from "node:path";
import fs from "fs-extra";
import { ExpiredSignedUrlError, InputNotFoundError, SubmissionError, errorMessage } from "./errors.js";
import { DEFAULT_OCR_MODEL, type OcrClient } from "./providers/mistral.js";
import type { InputSpec, Logger, OcrResult } from "./types.js";

export const DEFAULT_SIGNED_URL_EXPIRY_SECONDS = 60;

export type SubmitOptions = {
  includeImages: boolean;
  logger: Logger;
  model?: string;
  /** Validity window of the signed URL handed to the OCR call. */
  signedUrlExpirySeconds?: number;
  /** Best-effort delete of the uploaded file once processing is over. */
  deleteUploaded?: boolean;
  now?: () => number;
};

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

async function submitUrl(client: OcrClient, url: string, opts: SubmitOptions): Promise<OcrResult> {
  opts.logger.info("Processing URL", { url });
  return client.processDocument({
    documentUrl: url,
    includeImageBase64: opts.includeImages,
    model: opts.model ?? DEFAULT_OCR_MODEL,
  });
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

// Reading is the existence check: the path may have vanished since it was classified.
async function readInput(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (e) {
    if (errnoCode(e) === "ENOENT") throw new InputNotFoundError(filePath);
    throw new SubmissionError(`Cannot read ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
}

async function submitFile(client: OcrClient, filePath: string, opts: SubmitOptions): Promise<OcrResult> {
  const { logger } = opts;
  const now = opts.now ?? Date.now;
  const expirySeconds = opts.signedUrlExpirySeconds ?? DEFAULT_SIGNED_URL_EXPIRY_SECONDS;

  logger.info("Processing file", { file_path: filePath });

  const content = await readInput(filePath);

  let start = now();
  const uploaded = await client.uploadFile({ fileName: path.basename(filePath), content });
  logger.debug("File uploaded", { file_id: uploaded.id, duration: seconds(now() - start) });

  try {
    start = now();
    const signed = await client.getSignedUrl({ fileId: uploaded.id, expirySeconds });
    const signedAt = now();
    logger.debug("Signed URL obtained", { duration: seconds(signedAt - start), valid_for: `${signed.expiresInSeconds}s` });

    // Measured against the validity the service granted, which may exceed the one requested.
    const windowMs = signed.expiresInSeconds * 1000;
    const beforeOcr = now();
    let result: OcrResult;
    try {
      result = await client.processDocument({
        documentUrl: signed.url,
        includeImageBase64: opts.includeImages,
        model: opts.model ?? DEFAULT_OCR_MODEL,
      });
    } catch (e) {
      const elapsed = now() - signedAt;
      if (elapsed >= windowMs) throw new ExpiredSignedUrlError(signed.expiresInSeconds, elapsed, { cause: e });
      throw e;
    }
    logger.debug("OCR processing completed", { duration: seconds(now() - beforeOcr), pages: result.pages.length });
    return result;
  } finally {
    if (opts.deleteUploaded) await deleteQuietly(client, uploaded.id, logger);
  }
}

async function deleteQuietly(client: OcrClient, fileId: string, logger: Logger): Promise<void> {
  try {
    await client.deleteFile(fileId);
    logger.debug("Uploaded file deleted", { file_id: fileId });
  } catch (e) {
    logger.warn("Could not delete uploaded file", { file_id: fileId, error: errorMessage(e) });
  }
}

export async function submitDocument(client: OcrClient, spec: InputSpec, opts: SubmitOptions): Promise<OcrResult> {
  switch (spec.kind) {
    case "url":
      return submitUrl(client, spec.value, opts);
    case "file":
      return submitFile(client, spec.value, opts);
  }
}
