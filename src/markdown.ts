import { AssemblerContractViolation } from "./errors.js";
import type { OcrPage, OcrResult } from "./types.js";

export const PAGE_SEPARATOR = "\n\n---\n\n";

const PLACEHOLDER = /!\[([^\]\n]+)\]\(([^)\s]+)\)/g;

export function replaceImagePlaceholders(markdown: string, images: ReadonlyMap<string, string>): string {
  let out = markdown;
  for (const [id, data] of images) {
    out = out.split(`![${id}](${id})`).join(`![${id}](${data})`);
  }
  return out;
}

/** Placeholder ids (`![x](x)`) in the page that have no entry in its image list. */
export function unknownPlaceholders(page: OcrPage): string[] {
  const known = new Set(page.images.map((img) => img.id));
  const missing: string[] = [];
  for (const m of page.markdown.matchAll(PLACEHOLDER)) {
    const [, alt, target] = m;
    if (alt === undefined || alt !== target) continue;
    if (!known.has(alt) && !missing.includes(alt)) missing.push(alt);
  }
  return missing;
}

function renderPage(page: OcrPage, includeImages: boolean): string {
  if (!includeImages) return page.markdown;

  const unknown = unknownPlaceholders(page);
  if (unknown[0] !== undefined) throw new AssemblerContractViolation(page.index, unknown[0]);

  const data = new Map<string, string>();
  for (const img of page.images) {
    if (img.imageBase64) data.set(img.id, img.imageBase64);
  }
  return data.size ? replaceImagePlaceholders(page.markdown, data) : page.markdown;
}

export function assembleMarkdown(result: OcrResult, opts: { includeImages: boolean }): string {
  return result.pages.map((page) => renderPage(page, opts.includeImages)).join(PAGE_SEPARATOR);
}
