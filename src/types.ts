export type Provider = "gemini" | "anthropic" | "openrouter";

export type EssayFormat = "txt" | "docx" | "pdf";

export type PassageOperation = "rewrite" | "rephrase" | "expand";

export type MenuAction = PassageOperation | "show" | "save";

export type EditStatus = "pending" | "accepted" | "rejected";

export type LoadedEssay = {
  filename: string;
  format: EssayFormat;
  text: string;
  sourceDocx?: Buffer;
};

export type Suggestion = {
  text: string;
  provider: Provider;
  model: string;
  createdAt: string;
};

export type PassageSelection = {
  text: string;
  start: number;
  end: number;
  source: "lines" | "text";
};

export type EditOperation = {
  id: string;
  operation: PassageOperation;
  passage: string;
  start: number;
  end: number;
  proposedText: string;
  feedback?: string;
  status: EditStatus;
};

export type ListedModel = {
  id: string;
  label?: string;
};
