import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

const RunConfigSchema = z
  .object({
    input: z.string().optional(),
    output: z.string().optional(),
    model: z.string().optional(),
    inlineImages: z.boolean().optional(),
    signedUrlExpirySeconds: z.number().int().positive().optional(),
    deleteUploaded: z.boolean().optional(),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

export function parseRunConfig(raw: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid config JSON: ${msg}`);
  }

  // Normalize: convert blank strings to undefined.
  const cfg = parsed.data;
  return {
    input: cleanString(cfg.input),
    output: cleanString(cfg.output),
    model: cleanString(cfg.model),
    inlineImages: cfg.inlineImages,
    signedUrlExpirySeconds: cfg.signedUrlExpirySeconds,
    deleteUploaded: cfg.deleteUploaded,
  };
}

export async function readRunConfig(configPath: string): Promise<RunConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new ConfigurationError(`Config file not found: ${configPath}`);

  let raw: unknown;
  try {
    raw = await fs.readJson(abs);
  } catch (e) {
    throw new ConfigurationError(`Config file is not valid JSON: ${configPath} (${e instanceof Error ? e.message : String(e)})`);
  }
  return parseRunConfig(raw);
}

export function mergeRunConfig(
  cli: {
    input?: unknown;
    output?: unknown;
    model?: unknown;
    inlineImages?: unknown;
    signedUrlExpirySeconds?: unknown;
    deleteUploaded?: unknown;
  },
  cfg: RunConfig,
): RunConfig {
  // CLI wins when explicitly set (including booleans)
  const merged: RunConfig = {
    ...cfg,
  };

  const input = cleanString(cli.input);
  if (input) merged.input = input;

  const output = cleanString(cli.output);
  if (output) merged.output = output;

  const model = cleanString(cli.model);
  if (model) merged.model = model;

  if (typeof cli.inlineImages === "boolean") merged.inlineImages = cli.inlineImages;
  if (typeof cli.signedUrlExpirySeconds === "number") merged.signedUrlExpirySeconds = cli.signedUrlExpirySeconds;
  if (typeof cli.deleteUploaded === "boolean") merged.deleteUploaded = cli.deleteUploaded;

  return merged;
}
