import path from "node:path";
import type { InputSpec } from "./types.js";

// scheme "://" authority, e.g. https://host/doc.pdf. Anything else is a local path.
// Note: "C://share/doc.pdf" also matches and is treated as a URL.
const URL_WITH_AUTHORITY = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#\s]+/;

export function isUrl(raw: string): boolean {
  return URL_WITH_AUTHORITY.test(raw.trim());
}

export function classifyInput(raw: string): InputSpec {
  if (isUrl(raw)) return { kind: "url", value: raw.trim() };
  return { kind: "file", value: raw };
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? name : name.slice(0, dot);
}

function urlBaseName(raw: string): string {
  let pathname: string;
  try {
    pathname = new URL(raw).pathname;
  } catch {
    const m = raw.replace(URL_WITH_AUTHORITY, "").split(/[?#]/)[0];
    pathname = m ?? "";
  }
  return stripExtension(path.posix.basename(pathname));
}

export function defaultOutputPath(spec: InputSpec): string {
  const base = spec.kind === "url" ? urlBaseName(spec.value) : path.parse(spec.value).name;
  return `${base || "output"}.md`;
}

export function resolveOutputPath(spec: InputSpec, explicit?: string): string {
  const out = explicit?.trim();
  return out ? out : defaultOutputPath(spec);
}
