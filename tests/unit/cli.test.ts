import { promises as fs } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseCliArgs, runCli, USAGE } from "../../src/cli.js";
import { createLogger } from "../../src/logger.js";
import { FakeGenerator, ScriptedPrompter } from "../helpers/fakes.js";
import { makeTempDir } from "../helpers/fixtures.js";

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("parseCliArgs", () => {
  it("should read the file and options", () => {
    expect(parseCliArgs(["essay.txt", "-p", "anthropic", "--model", "m1", "--out-dir", "out", "--docx"])).toEqual({
      file: "essay.txt",
      provider: "anthropic",
      model: "m1",
      outDir: "out",
      docx: true,
      listModels: false,
      help: false
    });
  });

  it("should reject unknown providers and options", () => {
    expect(() => parseCliArgs(["--provider", "bogus"])).toThrow(/provider/);
    expect(() => parseCliArgs(["--bogus"])).toThrow();
    expect(() => parseCliArgs(["a.txt", "b.txt"])).toThrow("Only one essay file can be edited at a time.");
  });
});

describe("runCli", () => {
  it("should print usage for --help", async () => {
    const stdout = capture();
    expect(await runCli(["--help"], { stdout: stdout.write })).toBe(0);
    expect(stdout.lines).toEqual([USAGE]);
  });

  it("should exit with 2 on bad arguments", async () => {
    const stderr = capture();
    expect(await runCli(["--provider", "bogus"], { stderr: stderr.write })).toBe(2);
    expect(stderr.lines[1]).toBe(USAGE);
  });

  it("should stop before loading when the API key is missing", async () => {
    const stderr = capture();
    const prompter = new ScriptedPrompter([]);

    const code = await runCli(["essay.txt"], {
      env: { ESSAY_PROVIDER: "anthropic" },
      stderr: stderr.write,
      prompter
    });

    expect(code).toBe(1);
    expect(stderr.lines).toEqual(['Error: Missing API key for provider "anthropic". Set ANTHROPIC_API_KEY.']);
    expect(prompter.lines).toHaveLength(0);
  });

  it("should run a full session with the injected generator", async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, "essay.txt");
    await fs.writeFile(filePath, "The cat sat on the mat.", "utf8");
    const prompter = new ScriptedPrompter(["1", "cat sat", "y", "4"]);

    const code = await runCli([filePath, "--out-dir", dir], {
      env: { GEMINI_API_KEY: "test-secret" },
      prompter,
      logger: createLogger("silent"),
      createGenerator: () => new FakeGenerator(["Suggested.", "feline rested"])
    });

    expect(code).toBe(0);
    expect(prompter.closed).toBe(true);
    expect(await fs.readFile(path.join(dir, "essay_edited.txt"), "utf8")).toBe("The feline rested on the mat.");
  });
});
