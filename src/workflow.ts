import { EssaySession } from "./essaySession.js";
import { describeError, InputClosedError, SelectionError } from "./errors.js";
import { Prompter } from "./io/prompter.js";
import { Logger } from "./logger.js";
import { buildPassagePrompt, buildRefinePrompt } from "./prompts.js";
import { TextGenerator, requestSuggestion } from "./services/aiService.js";
import { buildWordDiff, loadEssay } from "./services/documentService.js";
import { saveEssay, saveEssayDocx } from "./services/saveService.js";
import {
  MENU_OPTIONS,
  parseMenuAction,
  previewLines,
  selectPassage,
  splitLines
} from "./services/selectionService.js";
import { EditOperation, PassageOperation, PassageSelection } from "./types.js";

export type WorkflowStep =
  | "load"
  | "suggest"
  | "menu"
  | "select"
  | "propose"
  | "review"
  | "feedback"
  | "show"
  | "save"
  | "done";

export type WorkflowOptions = {
  generator: TextGenerator;
  prompter: Prompter;
  logger: Logger;
  outDir: string;
  filePath?: string;
  exportDocx?: boolean;
};

export type WorkflowResult = {
  status: "saved" | "failed" | "aborted";
  exitCode: number;
  outputPath?: string;
  docxOutputPath?: string;
  session?: EssaySession;
};

const WIDE_RULE = "=".repeat(80);
const NARROW_RULE = "=".repeat(50);
const PASSAGE_RULE = "-".repeat(40);

/**
 * Drives one editing session:
 * load -> suggest -> menu -> (select -> propose -> review -> accept | feedback -> propose) -> save.
 */
export class EssayWorkflow {
  private session?: EssaySession;
  private operation?: PassageOperation;
  private selection?: PassageSelection;
  private edit?: EditOperation;
  private feedback?: string;
  private result?: WorkflowResult;

  constructor(private readonly options: WorkflowOptions) {}

  private get prompter(): Prompter {
    return this.options.prompter;
  }

  private requireSession(): EssaySession {
    if (!this.session) {
      throw new Error("No essay is loaded.");
    }
    return this.session;
  }

  private banner(title: string, rule = WIDE_RULE): void {
    this.prompter.print(rule);
    this.prompter.print(title);
    this.prompter.print(rule);
  }

  private fail(message: string): "done" {
    this.prompter.print(message);
    this.options.logger.debug(`workflow failed: ${message}`);
    this.result = { status: "failed", exitCode: 1, session: this.session };
    return "done";
  }

  async run(): Promise<WorkflowResult> {
    let step: WorkflowStep = "load";
    try {
      while (step !== "done") {
        this.options.logger.debug(`step: ${step}`);
        step = await this.runStep(step);
      }
    } catch (error) {
      if (!(error instanceof InputClosedError)) {
        throw error;
      }
      this.prompter.print();
      this.prompter.print("Exiting...");
      this.result = { status: "aborted", exitCode: 0, session: this.session };
    }

    return this.result ?? { status: "aborted", exitCode: 0, session: this.session };
  }

  private runStep(step: Exclude<WorkflowStep, "done">): Promise<WorkflowStep> {
    switch (step) {
      case "load":
        return this.load();
      case "suggest":
        return this.suggest();
      case "menu":
        return this.menu();
      case "select":
        return this.select();
      case "propose":
        return this.propose();
      case "review":
        return this.review();
      case "feedback":
        return this.collectFeedback();
      case "show":
        return this.show();
      case "save":
        return this.save();
    }
  }

  private async load(): Promise<WorkflowStep> {
    this.prompter.print();
    this.prompter.print("=== AI Essay Editor ===");
    const filePath =
      this.options.filePath?.trim() ||
      (await this.prompter.ask("Enter the path to your essay file (.txt, .docx, .pdf): ")).trim();

    try {
      this.session = new EssaySession(await loadEssay(filePath));
    } catch (error) {
      return this.fail(`Error loading file: ${describeError(error, "unknown error")}`);
    }

    this.prompter.print();
    this.prompter.print(`✓ Successfully loaded essay: ${this.session.filename}`);
    this.prompter.print(`Essay length: ${this.session.originalText.length} characters`);
    return "suggest";
  }

  private async suggest(): Promise<WorkflowStep> {
    const session = this.requireSession();
    this.prompter.print();
    this.prompter.print("Generating suggested rewrite of your essay...");

    try {
      session.setSuggestion(await requestSuggestion(this.options.generator, session.originalText));
    } catch (error) {
      return this.fail(`Error generating rewrite: ${describeError(error, "unknown error")}`);
    }

    this.prompter.print();
    this.banner("SUGGESTED REWRITE:");
    this.prompter.print(session.suggestion?.text);
    this.prompter.print(WIDE_RULE);
    return "menu";
  }

  private async menu(): Promise<WorkflowStep> {
    this.prompter.print();
    this.prompter.print(NARROW_RULE);
    this.prompter.print("What would you like to do?");
    for (const option of MENU_OPTIONS) {
      this.prompter.print(`${option.key} - ${option.label}`);
    }
    this.prompter.print(NARROW_RULE);

    for (;;) {
      const action = parseMenuAction(await this.prompter.ask("Choice: "));
      if (!action) {
        this.prompter.print("Invalid choice. Please enter 0, 1, 2, 3, or 4.");
        continue;
      }
      if (action === "show" || action === "save") {
        return action;
      }
      this.operation = action;
      this.feedback = undefined;
      this.edit = undefined;
      return "select";
    }
  }

  private async select(): Promise<WorkflowStep> {
    const session = this.requireSession();
    this.prompter.print();
    this.prompter.print("Select the passage you want to edit.");
    this.prompter.print("You can either:");
    this.prompter.print("1. Copy and paste the exact text");
    this.prompter.print("2. Type line numbers (e.g., '5-8' for lines 5 through 8)");
    this.prompter.print();
    this.prompter.print(`Current essay has ${splitLines(session.workingText).length} lines.`);
    this.prompter.print("First few lines for reference:");
    previewLines(session.workingText).forEach((line) => this.prompter.print(line));

    for (;;) {
      const input = await this.prompter.ask("\nEnter your selection: ");
      try {
        this.selection = selectPassage(session.workingText, input);
      } catch (error) {
        if (error instanceof SelectionError) {
          this.prompter.print(error.message);
          continue;
        }
        throw error;
      }

      this.prompter.print();
      this.prompter.print("Selected passage:");
      this.prompter.print(PASSAGE_RULE);
      this.prompter.print(this.selection.text);
      this.prompter.print(PASSAGE_RULE);
      return "propose";
    }
  }

  private async propose(): Promise<WorkflowStep> {
    const session = this.requireSession();
    const { operation, selection } = this;
    if (!operation || !selection) {
      return "menu";
    }

    const prompt =
      this.feedback && this.edit
        ? buildRefinePrompt({
            operation,
            passage: selection.text,
            rejectedText: this.edit.proposedText,
            feedback: this.feedback
          })
        : buildPassagePrompt(operation, selection.text);

    this.prompter.print();
    this.prompter.print("Processing your request...");
    try {
      const proposed = await this.options.generator.generate(prompt);
      this.edit = session.propose(operation, selection, proposed, this.feedback);
    } catch (error) {
      this.prompter.print(`Error processing passage: ${describeError(error, "unknown error")}`);
      return "menu";
    }
    return "review";
  }

  private async review(): Promise<WorkflowStep> {
    const session = this.requireSession();
    const edit = this.edit;
    if (!edit) {
      return "menu";
    }

    this.prompter.print();
    this.banner("ORIGINAL PASSAGE:");
    this.prompter.print(edit.passage);
    this.prompter.print();
    this.banner("SUGGESTED REVISION:");
    this.prompter.print(edit.proposedText);
    this.prompter.print();
    this.banner("CHANGES:");
    this.prompter.print(buildWordDiff(edit.passage, edit.proposedText));
    this.prompter.print(WIDE_RULE);

    for (;;) {
      const answer = (await this.prompter.ask("\nDo you want to accept this revision? (y/n): "))
        .trim()
        .toLowerCase();

      if (answer === "y" || answer === "yes") {
        try {
          this.edit = session.accept(edit);
        } catch (error) {
          if (error instanceof SelectionError) {
            this.prompter.print(error.message);
            return "menu";
          }
          throw error;
        }
        this.options.logger.debug(`accepted ${edit.operation} edit ${edit.id}`);
        this.prompter.print();
        this.prompter.print("✓ Passage updated successfully!");
        return "menu";
      }

      if (answer === "n" || answer === "no") {
        this.edit = session.reject(edit);
        return "feedback";
      }

      this.prompter.print("Please enter 'y' for yes or 'n' for no.");
    }
  }

  private async collectFeedback(): Promise<WorkflowStep> {
    this.prompter.print();
    this.prompter.print("What would you like me to change? Please provide specific feedback:");
    this.prompter.print("(e.g., 'make it simpler', 'more formal', 'shorter', 'add more examples')");
    this.prompter.print("Leave empty to return to the menu.");

    const feedback = (await this.prompter.ask("Your feedback: ")).trim();
    if (!feedback) {
      this.feedback = undefined;
      return "menu";
    }
    this.feedback = feedback;
    return "propose";
  }

  private async show(): Promise<WorkflowStep> {
    const session = this.requireSession();
    this.prompter.print();
    this.banner("CURRENT ESSAY:");
    this.prompter.print(session.workingText);
    this.prompter.print(WIDE_RULE);
    await this.prompter.ask("\nPress Enter to continue...");
    return "menu";
  }

  private async save(): Promise<WorkflowStep> {
    const session = this.requireSession();
    if (!session.hasChanges) {
      this.prompter.print();
      this.prompter.print("No changes were made; saving the essay as loaded.");
    }

    let outputPath: string;
    try {
      outputPath = await saveEssay(session, this.options.outDir);
    } catch (error) {
      return this.fail(describeError(error, "Error saving file."));
    }
    this.prompter.print();
    this.prompter.print(`✓ Essay saved successfully as: ${outputPath}`);

    let docxOutputPath: string | undefined;
    if (this.options.exportDocx && session.format === "docx") {
      try {
        docxOutputPath = await saveEssayDocx(session, this.options.outDir);
        this.prompter.print(`✓ Word copy saved as: ${docxOutputPath}`);
      } catch (error) {
        this.options.logger.warn(describeError(error, "Could not write the .docx copy."));
      }
    } else if (this.options.exportDocx) {
      this.options.logger.warn(`--docx ignored: ${session.filename} was not loaded from .docx.`);
    }

    this.prompter.print("Thank you for using AI Essay Editor!");
    this.result = { status: "saved", exitCode: 0, outputPath, docxOutputPath, session };
    return "done";
  }
}
