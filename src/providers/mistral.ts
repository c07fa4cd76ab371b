import { Mistral } from "@mistralai/mistralai";
import { z } from "zod";
import { RemoteError, errorMessage } from "../errors.js";
import type { OcrResult } from "../types.js";

export const DEFAULT_OCR_MODEL = "mistral-ocr-latest";

export interface OcrClient {
  uploadFile(args: { fileName: string; content: Uint8Array }): Promise<{ id: string }>;
  /** Resolves with the URL and the validity the service actually granted. */
  getSignedUrl(args: { fileId: string; expirySeconds: number }): Promise<{ url: string; expiresInSeconds: number }>;
  processDocument(args: { documentUrl: string; includeImageBase64: boolean; model: string }): Promise<OcrResult>;
  deleteFile(fileId: string): Promise<void>;
}

const OcrResponseSchema = z.object({
  model: z.string().optional(),
  pages: z.array(
    z.object({
      index: z.number().int(),
      markdown: z.string(),
      images: z
        .array(
          z.object({
            id: z.string(),
            imageBase64: z.string().nullish(),
          }),
        )
        .default([]),
    }),
  ),
});

export function parseOcrResponse(raw: unknown, fallbackModel: string): OcrResult {
  const parsed = OcrResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new RemoteError(`Malformed OCR response: ${msg}`);
  }

  return {
    model: parsed.data.model ?? fallbackModel,
    pages: parsed.data.pages.map((p) => ({
      index: p.index,
      markdown: p.markdown,
      images: p.images.map((img) => (img.imageBase64 ? { id: img.id, imageBase64: img.imageBase64 } : { id: img.id })),
    })),
  };
}

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("statusCode" in e)) return undefined;
  const code = e.statusCode;
  return typeof code === "number" ? code : undefined;
}

async function remoteCall<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof RemoteError) throw e;
    throw new RemoteError(`${what} failed: ${errorMessage(e)}`, statusCodeOf(e), { cause: e });
  }
}

/** Signed URL lifetimes are set in whole hours by the files API. */
export function expiryHours(expirySeconds: number): number {
  return Math.max(1, Math.ceil(expirySeconds / 3600));
}

export function createMistralOcrClient(opts: { apiKey: string; serverURL?: string }): OcrClient {
  const client = new Mistral({ apiKey: opts.apiKey, serverURL: opts.serverURL });

  return {
    uploadFile: ({ fileName, content }) =>
      remoteCall("File upload", async () => {
        const uploaded = await client.files.upload({ file: { fileName, content }, purpose: "ocr" });
        return { id: uploaded.id };
      }),

    getSignedUrl: ({ fileId, expirySeconds }) =>
      remoteCall("Signed URL request", async () => {
        const hours = expiryHours(expirySeconds);
        const signed = await client.files.getSignedUrl({ fileId, expiry: hours });
        return { url: signed.url, expiresInSeconds: hours * 3600 };
      }),

    processDocument: ({ documentUrl, includeImageBase64, model }) =>
      remoteCall("OCR processing", async () => {
        const resp = await client.ocr.process({
          model,
          document: { type: "document_url", documentUrl },
          includeImageBase64,
        });
        return parseOcrResponse(resp, model);
      }),

    deleteFile: (fileId) =>
      remoteCall("File delete", async () => {
        await client.files.delete({ fileId });
      }),
  };
}
