export type InputKind = "url" | "file";

export type InputSpec = { kind: "url"; value: string } | { kind: "file"; value: string };

export interface OcrImage {
  /** Placeholder name used in the page markdown as `![id](id)`. */
  id: string;
  /** Data URL, present only when image data was requested and could be extracted. */
  imageBase64?: string;
}

export interface OcrPage {
  index: number;
  markdown: string;
  images: readonly OcrImage[];
}

export interface OcrResult {
  model: string;
  pages: readonly OcrPage[];
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
}

export interface ConversionResult {
  inputKind: InputKind;
  outputPath: string;
  pageCount: number;
  bytesWritten: number;
}
