import fs from "fs-extra";

/** Creates parent directories, then overwrites the file in place. */
export async function writeText(filePath: string, content: string): Promise<number> {
  await fs.outputFile(filePath, content, "utf-8");
  return Buffer.byteLength(content, "utf-8");
}
