import chalk from "chalk";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createConsoleLogger, formatFields } from "../../src/util/logger.js";

describe("createConsoleLogger", () => {
  const level = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  const fixed = () => new Date(2024, 0, 2, 3, 4, 5);

  it("prints timestamp, level, message and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createConsoleLogger({ now: fixed }).info("Markdown file created", { output_path: "report.md" });

    expect(log).toHaveBeenCalledWith("2024-01-02 03:04:05 [info ] Markdown file created output_path=report.md");
  });

  it("hides debug output unless verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createConsoleLogger({ now: fixed }).debug("quiet");
    expect(log).not.toHaveBeenCalled();

    createConsoleLogger({ now: fixed, verbose: true }).debug("loud");
    expect(log).toHaveBeenCalledWith("2024-01-02 03:04:05 [debug] loud");
  });

  it("sends warnings and errors to stderr", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});

    createConsoleLogger({ now: fixed }).error("Error occurred", { error: "quota exceeded" });

    expect(err).toHaveBeenCalledWith('2024-01-02 03:04:05 [error] Error occurred error="quota exceeded"');
  });
});

describe("formatFields", () => {
  it("skips undefined values and encodes non-strings as JSON", () => {
    const level = chalk.level;
    chalk.level = 0;
    expect(formatFields({ a: 1, b: undefined, c: true, d: "x" })).toBe("a=1 c=true d=x");
    chalk.level = level;
  });
});
