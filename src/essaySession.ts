import { v4 as uuidv4 } from "uuid";
import { SelectionError } from "./errors.js";
import { findPassage } from "./services/selectionService.js";
import {
  EditOperation,
  EditStatus,
  EssayFormat,
  LoadedEssay,
  PassageOperation,
  PassageSelection,
  Suggestion
} from "./types.js";

export class EssaySession {
  readonly filename: string;
  readonly format: EssayFormat;
  readonly originalText: string;
  readonly sourceDocx?: Buffer;

  private working: string;
  private suggestionValue?: Suggestion;
  private readonly accepted: EditOperation[] = [];
  private readonly decisions = new Map<string, EditStatus>();

  constructor(essay: LoadedEssay) {
    this.filename = essay.filename;
    this.format = essay.format;
    this.originalText = essay.text;
    this.working = essay.text;
    this.sourceDocx = essay.sourceDocx ? Buffer.from(essay.sourceDocx) : undefined;
  }

  get workingText(): string {
    return this.working;
  }

  get suggestion(): Suggestion | undefined {
    return this.suggestionValue;
  }

  get hasChanges(): boolean {
    return this.accepted.length > 0;
  }

  get history(): readonly EditOperation[] {
    return this.accepted;
  }

  setSuggestion(suggestion: Suggestion): void {
    if (this.suggestionValue) {
      throw new Error("A suggestion has already been generated for this session.");
    }
    this.suggestionValue = { ...suggestion };
  }

  propose(
    operation: PassageOperation,
    selection: PassageSelection,
    proposedText: string,
    feedback?: string
  ): EditOperation {
    return {
      id: uuidv4(),
      operation,
      passage: selection.text,
      start: selection.start,
      end: selection.end,
      proposedText,
      feedback,
      status: "pending"
    };
  }

  private locate(edit: EditOperation): { start: number; end: number } {
    if (this.working.slice(edit.start, edit.end) === edit.passage && edit.passage.length > 0) {
      return { start: edit.start, end: edit.end };
    }
    const found = findPassage(this.working, edit.passage);
    if (!found) {
      throw new SelectionError("The selected passage is no longer present in the essay.");
    }
    return found;
  }

  // Keyed by edit id: the status on a caller's copy may be stale.
  private assertUndecided(edit: EditOperation): void {
    const status = this.decisions.get(edit.id) ?? edit.status;
    if (status !== "pending") {
      throw new Error(`Edit ${edit.id} has already been ${status}.`);
    }
  }

  accept(edit: EditOperation): EditOperation {
    this.assertUndecided(edit);

    const { start, end } = this.locate(edit);
    this.working = `${this.working.slice(0, start)}${edit.proposedText}${this.working.slice(end)}`;

    const decided: EditOperation = { ...edit, start, end, status: "accepted" };
    this.accepted.push(decided);
    this.decisions.set(edit.id, "accepted");
    return decided;
  }

  reject(edit: EditOperation): EditOperation {
    this.assertUndecided(edit);
    this.decisions.set(edit.id, "rejected");
    return { ...edit, status: "rejected" };
  }
}
