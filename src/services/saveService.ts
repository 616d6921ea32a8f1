import { promises as fs } from "node:fs";
import path from "node:path";
import { EssaySession } from "../essaySession.js";
import { describeError, SaveError } from "../errors.js";
import { exportDocx } from "./documentService.js";

function baseName(filename: string): string {
  const name = path.basename(filename);
  return name.slice(0, name.length - path.extname(name).length) || name;
}

export function deriveOutputPath(filename: string, outDir: string): string {
  return path.join(outDir, `${baseName(filename)}_edited.txt`);
}

export function deriveDocxOutputPath(filename: string, outDir: string): string {
  return path.join(outDir, `${baseName(filename)}_edited.docx`);
}

async function writeOutput(filePath: string, data: string | Buffer): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);
  } catch (error) {
    throw new SaveError(`Error saving ${filePath}: ${describeError(error, "unknown error")}`, error);
  }
}

export async function saveEssay(session: EssaySession, outDir: string): Promise<string> {
  const outputPath = deriveOutputPath(session.filename, outDir);
  await writeOutput(outputPath, Buffer.from(session.workingText, "utf8"));
  return outputPath;
}

export async function saveEssayDocx(session: EssaySession, outDir: string): Promise<string> {
  if (!session.sourceDocx) {
    throw new SaveError("A .docx copy can only be written for essays loaded from .docx.");
  }
  const buffer = await exportDocx(session.sourceDocx, session.workingText);
  const outputPath = deriveDocxOutputPath(session.filename, outDir);
  await writeOutput(outputPath, buffer);
  return outputPath;
}
