import { PassageOperation } from "./types.js";

export function buildFullRewritePrompt(essay: string): string {
  return [
    "You are an academic writing assistant. The user has uploaded an essay.",
    "Rewrite the entire essay for clarity, logical flow, grammar, and readability,",
    "while preserving its original meaning and philosophical depth.",
    "Do not shorten unless absolutely necessary. Return only the rewritten essay text.",
    "",
    "Essay to rewrite:",
    essay
  ].join("\n");
}

const OPERATION_INSTRUCTIONS: Record<PassageOperation, { lines: string[]; label: string }> = {
  rewrite: {
    label: "Passage to rewrite:",
    lines: [
      "You are an academic editor. Rewrite the following passage.",
      "Keep the meaning intact, but improve grammar, clarity, structure,",
      "and logical flow. Maintain the same academic tone as the original essay.",
      "Return only the rewritten passage."
    ]
  },
  rephrase: {
    label: "Passage to rephrase:",
    lines: [
      "You are a stylistic writing assistant. Rephrase the following passage",
      "so that it has a different style and sentence structure,",
      "but retains the same meaning. Keep the academic tone consistent",
      "with the rest of the essay. Return only the rephrased passage."
    ]
  },
  expand: {
    label: "Passage to expand:",
    lines: [
      "You are an essay writer. Expand the following passage",
      "by adding new original content that deepens the discussion,",
      "provides examples, or adds reasoning. Keep the academic",
      "tone consistent with the rest of the essay.",
      "Do not repeat sentences verbatim. Return only the expanded passage."
    ]
  }
};

export function buildPassagePrompt(operation: PassageOperation, passage: string): string {
  const instruction = OPERATION_INSTRUCTIONS[operation];
  return [...instruction.lines, "", instruction.label, passage].join("\n");
}

export function buildRefinePrompt(args: {
  operation: PassageOperation;
  passage: string;
  rejectedText: string;
  feedback: string;
}): string {
  return [
    "You are an academic editor. The user rejected a proposed revision and provided feedback.",
    `The requested operation was: ${args.operation}.`,
    "Revise the passage according to their feedback while maintaining academic quality.",
    "Return only the revised passage.",
    "",
    "Rejected revision:",
    args.rejectedText,
    "",
    `User feedback: ${args.feedback}`,
    "",
    "Original passage:",
    args.passage
  ].join("\n");
}
