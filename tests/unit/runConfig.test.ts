import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mergeRunConfig, parseRunConfig, readRunConfig } from "../../src/util/runConfig.js";
import { ConfigurationError } from "../../src/errors.js";
import { makeTempDir } from "../helpers/fakes.js";

describe("parseRunConfig", () => {
  it("normalizes blank strings to undefined", () => {
    expect(parseRunConfig({ input: "  ", output: " out.md ", deleteUploaded: true })).toEqual({
      input: undefined,
      output: "out.md",
      model: undefined,
      inlineImages: undefined,
      signedUrlExpirySeconds: undefined,
      deleteUploaded: true,
    });
  });

  it("rejects unknown keys", () => {
    expect(() => parseRunConfig({ apiKey: "test-secret" })).toThrow(ConfigurationError);
  });

  it("rejects a non-positive expiry", () => {
    expect(() => parseRunConfig({ signedUrlExpirySeconds: 0 })).toThrow(
      "Invalid config JSON: signedUrlExpirySeconds: Number must be greater than 0",
    );
  });
});

describe("readRunConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("fails for a missing file", async () => {
    await expect(readRunConfig(path.join(dir, "none.json"))).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails for a file that is not JSON", async () => {
    const p = path.join(dir, "broken.json");
    await fs.writeFile(p, "{ nope");
    await expect(readRunConfig(p)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("reads a valid file", async () => {
    const p = path.join(dir, "ok.json");
    await fs.writeJson(p, { input: "doc.pdf", signedUrlExpirySeconds: 90 });
    await expect(readRunConfig(p)).resolves.toMatchObject({ input: "doc.pdf", signedUrlExpirySeconds: 90 });
  });
});

describe("mergeRunConfig", () => {
  it("lets explicit CLI values win, including false booleans", () => {
    const merged = mergeRunConfig(
      { output: "cli.md", inlineImages: false, deleteUploaded: undefined },
      { input: "cfg.pdf", output: "cfg.md", inlineImages: true, deleteUploaded: true },
    );
    expect(merged).toEqual({ input: "cfg.pdf", output: "cli.md", inlineImages: false, deleteUploaded: true });
  });
});
