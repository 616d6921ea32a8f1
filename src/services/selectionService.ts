import { SelectionError } from "../errors.js";
import { MenuAction, PassageSelection } from "../types.js";

const LINE_RANGE_REGEX = /^(\d+)\s*-\s*(\d+)$/;

export const MENU_OPTIONS: ReadonlyArray<{ key: string; action: MenuAction; label: string }> = [
  { key: "0", action: "rewrite", label: "Rewrite a portion or phrase" },
  { key: "1", action: "rephrase", label: "Rephrase a portion or phrase" },
  { key: "2", action: "expand", label: "Write for me (expand on portion or phrase)" },
  { key: "3", action: "show", label: "Show full essay" },
  { key: "4", action: "save", label: "Save and exit" }
];

export function parseMenuAction(input: string): MenuAction | undefined {
  const normalized = input.trim().toLowerCase();
  return MENU_OPTIONS.find((option) => option.key === normalized || option.action === normalized)
    ?.action;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function selectLineRange(text: string, first: number, last: number): PassageSelection | undefined {
  // Split on "\n" alone so offsets count any "\r" that precedes it.
  const lines = text.split("\n");
  if (first < 1 || last > lines.length || first > last) {
    return undefined;
  }

  const start = lines.slice(0, first - 1).reduce((offset, line) => offset + line.length + 1, 0);
  const passage = lines.slice(first - 1, last).join("\n").replace(/\r$/, "");
  return {
    text: passage,
    start,
    end: start + passage.length,
    source: "lines"
  };
}

export function findPassage(text: string, passage: string): PassageSelection | undefined {
  if (!passage) {
    return undefined;
  }
  const start = text.indexOf(passage);
  if (start < 0) {
    return undefined;
  }
  return {
    text: passage,
    start,
    end: start + passage.length,
    source: "text"
  };
}

/**
 * Resolves user input against the working text. `N-M` selects lines N to M
 * (1-based, inclusive); anything else must appear verbatim in the text.
 */
export function selectPassage(workingText: string, input: string): PassageSelection {
  const selection = input.trim();
  if (!selection) {
    throw new SelectionError("Please provide either line numbers (e.g. '5-8') or paste the exact text.");
  }

  const rangeMatch = selection.match(LINE_RANGE_REGEX);
  if (rangeMatch) {
    const byLines = selectLineRange(workingText, Number(rangeMatch[1]), Number(rangeMatch[2]));
    if (byLines) {
      return byLines;
    }
    const literal = findPassage(workingText, selection);
    if (literal) {
      return literal;
    }
    throw new SelectionError(
      `Invalid line range. Essay has ${splitLines(workingText).length} lines.`
    );
  }

  const byText = findPassage(workingText, selection);
  if (!byText) {
    throw new SelectionError("Text not found in essay. Please check your selection.");
  }
  return byText;
}

export function previewLines(text: string, count = 5, width = 80): string[] {
  return splitLines(text)
    .slice(0, count)
    .map((line, index) => `${index + 1}: ${line.slice(0, width)}${line.length > width ? "..." : ""}`);
}
