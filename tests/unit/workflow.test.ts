import { promises as fs } from "node:fs";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { ModelRequestError } from "../../src/errors.js";
import { createLogger } from "../../src/logger.js";
import { buildPassagePrompt, buildRefinePrompt } from "../../src/prompts.js";
import { EssayWorkflow } from "../../src/workflow.js";
import { FakeGenerator, ScriptedPrompter } from "../helpers/fakes.js";
import { buildDocx, makeTempDir } from "../helpers/fixtures.js";

describe("EssayWorkflow", () => {
  let dir: string;
  let outDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outDir = path.join(dir, "out");
  });

  async function writeEssay(name: string, text: string): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, text, "utf8");
    return filePath;
  }

  function workflow(generator: FakeGenerator, prompter: ScriptedPrompter, filePath?: string, exportDocx = false) {
    return new EssayWorkflow({
      generator,
      prompter,
      logger: createLogger("silent"),
      outDir,
      filePath,
      exportDocx
    });
  }

  it("should apply an accepted rephrase and save it", async () => {
    const filePath = await writeEssay("essay.txt", "The cat sat on the mat.");
    const generator = new FakeGenerator(["A cat sat upon the mat.", "feline rested"]);
    const prompter = new ScriptedPrompter(["1", "cat sat", "y", "4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(result.status).toBe("saved");
    expect(result.exitCode).toBe(0);
    expect(result.outputPath).toBe(path.join(outDir, "essay_edited.txt"));
    expect(await fs.readFile(path.join(outDir, "essay_edited.txt"), "utf8")).toBe("The feline rested on the mat.");
    expect(generator.prompts[1]).toBe(buildPassagePrompt("rephrase", "cat sat"));
    expect(prompter.lines).toContain("A cat sat upon the mat.");
    expect(prompter.lines).toContain("CHANGES:");
    expect(prompter.lines).toContain("✓ Passage updated successfully!");
  });

  it("should ask for the file path when none was given", async () => {
    const filePath = await writeEssay("asked.txt", "Some text here.");
    const prompter = new ScriptedPrompter([filePath, "4"]);

    const result = await workflow(new FakeGenerator(["Suggested."]), prompter).run();

    expect(prompter.questions[0]).toBe("Enter the path to your essay file (.txt, .docx, .pdf): ");
    expect(result.outputPath).toBe(path.join(outDir, "asked_edited.txt"));
    expect(prompter.lines).toContain("No changes were made; saving the essay as loaded.");
    expect(await fs.readFile(path.join(outDir, "asked_edited.txt"), "utf8")).toBe("Some text here.");
  });

  it("should refine a rejected revision from feedback", async () => {
    const filePath = await writeEssay("lines.txt", "Line one is here.\nLine two stays.");
    const generator = new FakeGenerator(["Suggested.", "First draft.", "Short one."]);
    const prompter = new ScriptedPrompter(["0", "1-1", "n", "shorter", "y", "4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(result.session?.workingText).toBe("Short one.\nLine two stays.");
    expect(generator.prompts[2]).toBe(
      buildRefinePrompt({
        operation: "rewrite",
        passage: "Line one is here.",
        rejectedText: "First draft.",
        feedback: "shorter"
      })
    );
    expect(result.session?.history).toHaveLength(1);
    expect(result.session?.history[0]?.feedback).toBe("shorter");
  });

  it("should return to the menu without changes when feedback is empty", async () => {
    const filePath = await writeEssay("essay.txt", "Keep this sentence.");
    const generator = new FakeGenerator(["Suggested.", "Changed sentence."]);
    const prompter = new ScriptedPrompter(["0", "Keep this", "no", "", "4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(result.session?.workingText).toBe("Keep this sentence.");
    expect(generator.prompts).toHaveLength(2);
  });

  it("should re-prompt for invalid menu choices, selections and answers", async () => {
    const filePath = await writeEssay("essay.txt", "The cat sat on the mat.");
    const generator = new FakeGenerator(["Suggested.", "on the warm mat"]);
    const prompter = new ScriptedPrompter(["9", "2", "dog barked", "7-9", "on the mat", "maybe", "y", "4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(prompter.lines).toContain("Invalid choice. Please enter 0, 1, 2, 3, or 4.");
    expect(prompter.lines).toContain("Text not found in essay. Please check your selection.");
    expect(prompter.lines).toContain("Invalid line range. Essay has 1 lines.");
    expect(prompter.lines).toContain("Please enter 'y' for yes or 'n' for no.");
    expect(result.session?.workingText).toBe("The cat sat on the warm mat.");
  });

  it("should show the current essay on request", async () => {
    const filePath = await writeEssay("essay.txt", "Visible essay text.");
    const prompter = new ScriptedPrompter(["3", "", "4"]);

    await workflow(new FakeGenerator(["Suggested."]), prompter, filePath).run();

    const index = prompter.lines.indexOf("CURRENT ESSAY:");
    expect(index).toBeGreaterThan(-1);
    expect(prompter.lines[index + 2]).toBe("Visible essay text.");
  });

  it("should halt when the essay cannot be loaded", async () => {
    const generator = new FakeGenerator([]);
    const prompter = new ScriptedPrompter([]);
    const missing = path.join(dir, "missing.txt");

    const result = await workflow(generator, prompter, missing).run();

    expect(result).toEqual({ status: "failed", exitCode: 1, session: undefined });
    expect(prompter.lines).toContain(`Error loading file: File not found: ${missing}`);
    expect(generator.prompts).toHaveLength(0);
  });

  it("should halt when the suggestion request fails", async () => {
    const filePath = await writeEssay("essay.txt", "Text.");
    const generator = new FakeGenerator([new ModelRequestError("gemini", "boom")]);
    const prompter = new ScriptedPrompter(["4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(1);
    expect(prompter.lines).toContain("Error generating rewrite: gemini request failed: boom");
    await expect(fs.access(path.join(outDir, "essay_edited.txt"))).rejects.toThrow();
  });

  it("should report a failed passage request and keep the text", async () => {
    const filePath = await writeEssay("essay.txt", "The cat sat on the mat.");
    const generator = new FakeGenerator(["Suggested.", new ModelRequestError("gemini", "quota exceeded")]);
    const prompter = new ScriptedPrompter(["0", "cat sat", "4"]);

    const result = await workflow(generator, prompter, filePath).run();

    expect(prompter.lines).toContain("Error processing passage: gemini request failed: quota exceeded");
    expect(result.status).toBe("saved");
    expect(await fs.readFile(path.join(outDir, "essay_edited.txt"), "utf8")).toBe("The cat sat on the mat.");
  });

  it("should exit without saving when input ends", async () => {
    const filePath = await writeEssay("essay.txt", "Text.");
    const prompter = new ScriptedPrompter(["1"]);

    const result = await workflow(new FakeGenerator(["Suggested."]), prompter, filePath).run();

    expect(result.status).toBe("aborted");
    expect(result.exitCode).toBe(0);
    expect(prompter.lines).toContain("Exiting...");
    await expect(fs.access(path.join(outDir, "essay_edited.txt"))).rejects.toThrow();
  });

  it("should also write a .docx copy when asked", async () => {
    const filePath = path.join(dir, "essay.docx");
    await fs.writeFile(filePath, await buildDocx([["The cat sat on the mat."]]));
    const generator = new FakeGenerator(["Suggested.", "feline rested"]);
    const prompter = new ScriptedPrompter(["1", "cat sat", "y", "4"]);

    const result = await workflow(generator, prompter, filePath, true).run();

    expect(result.docxOutputPath).toBe(path.join(outDir, "essay_edited.docx"));
    expect(prompter.lines).toContain(`✓ Word copy saved as: ${path.join(outDir, "essay_edited.docx")}`);
  });
});
