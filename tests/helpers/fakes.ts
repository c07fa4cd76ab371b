import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import type { OcrClient } from "../../src/providers/mistral.js";
import type { LogFields, Logger, OcrPage, OcrResult } from "../../src/types.js";

export type ClientCall =
  | { op: "upload"; fileName: string; size: number }
  | { op: "sign"; fileId: string; expirySeconds: number }
  | { op: "process"; documentUrl: string; includeImageBase64: boolean; model: string }
  | { op: "delete"; fileId: string };

export class FakeOcrClient implements OcrClient {
  calls: ClientCall[] = [];
  result: OcrResult = { model: "mistral-ocr-latest", pages: [] };
  processError?: Error;
  deleteError?: Error;
  onProcess?: () => void;
  /** Validity reported for signed URLs; defaults to the requested window. */
  grantedSeconds?: number;

  constructor(pages: OcrPage[] = []) {
    this.result = { model: "mistral-ocr-latest", pages };
  }

  async uploadFile(args: { fileName: string; content: Uint8Array }): Promise<{ id: string }> {
    this.calls.push({ op: "upload", fileName: args.fileName, size: args.content.byteLength });
    return { id: "file-123" };
  }

  async getSignedUrl(args: { fileId: string; expirySeconds: number }): Promise<{ url: string; expiresInSeconds: number }> {
    this.calls.push({ op: "sign", fileId: args.fileId, expirySeconds: args.expirySeconds });
    return {
      url: `https://files.example.test/${args.fileId}?sig=test`,
      expiresInSeconds: this.grantedSeconds ?? args.expirySeconds,
    };
  }

  async processDocument(args: { documentUrl: string; includeImageBase64: boolean; model: string }): Promise<OcrResult> {
    this.calls.push({ op: "process", ...args });
    this.onProcess?.();
    if (this.processError) throw this.processError;
    return this.result;
  }

  async deleteFile(fileId: string): Promise<void> {
    this.calls.push({ op: "delete", fileId });
    if (this.deleteError) throw this.deleteError;
  }
}

export type LogEntry = { level: keyof Logger; msg: string; fields?: LogFields };

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (msg, fields) => entries.push({ level: "debug", msg, fields }),
    info: (msg, fields) => entries.push({ level: "info", msg, fields }),
    warn: (msg, fields) => entries.push({ level: "warn", msg, fields }),
    error: (msg, fields) => entries.push({ level: "error", msg, fields }),
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "pdf2md-test-"));
}

export function page(index: number, markdown: string, images: OcrPage["images"] = []): OcrPage {
  return { index, markdown, images };
}
