import { promises as fs } from "node:fs";
import path from "node:path";
import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { diffWords } from "diff";
import { DocumentReadError, SaveError, UnsupportedFormatError } from "../errors.js";
import { EssayFormat, LoadedEssay } from "../types.js";

const MAIN_DOCUMENT_PART = "word/document.xml";
const WORD_PARAGRAPH_TAG = "w:p";
const WORD_TEXT_TAG = "w:t";
const WORD_TAB_TAG = "w:tab";
const WORD_BREAK_TAGS = new Set(["w:br", "w:cr"]);
// Property blocks hold tab-stop definitions (`w:tabs/w:tab`), not content.
const WORD_PROPERTY_TAGS = new Set(["w:pPr", "w:rPr"]);

const FORMAT_BY_EXTENSION: Record<string, EssayFormat> = {
  ".txt": "txt",
  ".docx": "docx",
  ".pdf": "pdf"
};

type ItemList<T> = {
  length: number;
  item: (index: number) => T | null;
};

function nodeListToArray<T>(nodeList: ItemList<T>): T[] {
  const out: T[] = [];
  for (let i = 0; i < nodeList.length; i += 1) {
    const item = nodeList.item(i);
    if (item) {
      out.push(item);
    }
  }
  return out;
}

export function detectFormat(filePath: string): EssayFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(extension);
  }
  return format;
}

async function loadMainDocument(buffer: Buffer): Promise<Document> {
  const zip = await JSZip.loadAsync(buffer);
  const file = zip.file(MAIN_DOCUMENT_PART);
  if (!file) {
    throw new Error(`Missing ${MAIN_DOCUMENT_PART} in .docx archive.`);
  }
  const xml = await file.async("text");
  return new DOMParser().parseFromString(xml, "text/xml");
}

type ParagraphContent = {
  text: string;
  textNodes: Element[];
  markerNodes: Element[];
};

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function hasParagraphAncestor(node: Element): boolean {
  for (let parent = node.parentNode; parent; parent = parent.parentNode) {
    if (parent.nodeName === WORD_PARAGRAPH_TAG) {
      return true;
    }
  }
  return false;
}

/** Body paragraphs in order. Paragraphs nested in text boxes belong to their host paragraph. */
function topLevelParagraphs(document: Document): Element[] {
  return nodeListToArray(document.getElementsByTagName(WORD_PARAGRAPH_TAG)).filter(
    (paragraph) => !hasParagraphAncestor(paragraph)
  );
}

/**
 * Reads a paragraph as one line: `w:t` text, `w:tab` as a tab, `w:br`/`w:cr`
 * as a space, nested paragraphs separated by a space.
 */
function readParagraph(paragraph: Element): ParagraphContent {
  const content: ParagraphContent = { text: "", textNodes: [], markerNodes: [] };

  const walk = (node: Node): void => {
    nodeListToArray(node.childNodes).forEach((child) => {
      if (!isElement(child) || WORD_PROPERTY_TAGS.has(child.nodeName)) {
        return;
      }
      if (child.nodeName === WORD_TEXT_TAG) {
        content.text += child.textContent || "";
        content.textNodes.push(child);
      } else if (child.nodeName === WORD_TAB_TAG) {
        content.text += "\t";
        content.markerNodes.push(child);
      } else if (WORD_BREAK_TAGS.has(child.nodeName)) {
        content.text += " ";
        content.markerNodes.push(child);
      } else {
        if (child.nodeName === WORD_PARAGRAPH_TAG && content.text && !/\s$/.test(content.text)) {
          content.text += " ";
        }
        walk(child);
      }
    });
  };

  walk(paragraph);
  return content;
}

function paragraphTexts(document: Document): string[] {
  return topLevelParagraphs(document).map((paragraph) => readParagraph(paragraph).text);
}

export async function extractTextFromDocx(buffer: Buffer): Promise<string> {
  return paragraphTexts(await loadMainDocument(buffer)).join("\n");
}

export async function extractTextFromPdf(buffer: Buffer): Promise<string> {
  // pdf.js is loaded only for .pdf essays.
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const pdf = await getDocument({
    data: new Uint8Array(buffer),
    isEvalSupported: false,
    useSystemFonts: true
  }).promise;

  try {
    let text = "";
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const pageText = content.items
        .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : ""}` : ""))
        .join("");
      text += `${pageText}\n`;
    }
    return text;
  } finally {
    await pdf.destroy();
  }
}

export async function loadEssay(filePath: string): Promise<LoadedEssay> {
  const format = detectFormat(filePath);
  const filename = path.basename(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new DocumentReadError(`File not found: ${filePath}`, error);
    }
    throw new DocumentReadError(`Could not read ${filePath}.`, error);
  }

  let text: string;
  try {
    text =
      format === "txt"
        ? buffer.toString("utf-8")
        : format === "docx"
          ? await extractTextFromDocx(buffer)
          : await extractTextFromPdf(buffer);
  } catch (error) {
    throw new DocumentReadError(
      `Could not parse ${filename} as ${format}: ${error instanceof Error ? error.message : "unknown error"}`,
      error
    );
  }

  if (!text.trim()) {
    throw new DocumentReadError(`No text found in ${filename}.`);
  }

  return {
    filename,
    format,
    text,
    sourceDocx: format === "docx" ? buffer : undefined
  };
}

function requiresXmlSpacePreserve(text: string): boolean {
  return /^\s/.test(text) || /\s$/.test(text) || text.includes("  ") || text.includes("\t");
}

function setTextNodeValue(node: Element, value: string): void {
  while (node.firstChild) {
    node.removeChild(node.firstChild);
  }
  if (value.length > 0) {
    node.appendChild(node.ownerDocument.createTextNode(value));
  }
  if (requiresXmlSpacePreserve(value)) {
    node.setAttribute("xml:space", "preserve");
  } else {
    node.removeAttribute("xml:space");
  }
}

export function distributeTextAcrossNodes(originalLengths: number[], replacement: string): string[] {
  if (originalLengths.length === 1) {
    return [replacement];
  }

  const chunks = new Array<string>(originalLengths.length).fill("");
  if (originalLengths.every((length) => length === 0)) {
    chunks[0] = replacement;
    return chunks;
  }

  let cursor = 0;
  for (let index = 0; index < originalLengths.length; index += 1) {
    if (index === originalLengths.length - 1) {
      chunks[index] = replacement.slice(cursor);
      break;
    }
    const take = Math.min(originalLengths[index], Math.max(replacement.length - cursor, 0));
    chunks[index] = replacement.slice(cursor, cursor + take);
    cursor += take;
  }

  return chunks;
}

/**
 * Writes the working text back into the source .docx, paragraph by paragraph.
 * Only possible while the working text still has one line per source paragraph.
 * An edited paragraph loses its tab and break elements; their characters travel
 * in the replacement text instead.
 */
export async function exportDocx(sourceDocx: Buffer, workingText: string): Promise<Buffer> {
  const zip = await JSZip.loadAsync(sourceDocx);
  const document = await loadMainDocument(sourceDocx);
  const paragraphs = topLevelParagraphs(document);
  const lines = workingText.split("\n");

  if (lines.length !== paragraphs.length) {
    throw new SaveError(
      `Cannot export .docx: the essay now has ${lines.length} lines but the source has ${paragraphs.length} paragraphs.`
    );
  }

  let changed = false;
  paragraphs.forEach((paragraph, index) => {
    const { text: current, textNodes, markerNodes } = readParagraph(paragraph);
    const replacement = lines[index].replace(/\r/g, "");
    if (current === replacement) {
      return;
    }
    if (textNodes.length === 0) {
      throw new SaveError(`Cannot export .docx: paragraph ${index + 1} has no text run to update.`);
    }

    markerNodes.forEach((node) => {
      node.parentNode?.removeChild(node);
    });

    const chunks = distributeTextAcrossNodes(
      textNodes.map((node) => (node.textContent || "").length),
      replacement
    );
    textNodes.forEach((node, nodeIndex) => {
      setTextNodeValue(node, chunks[nodeIndex] || "");
    });
    changed = true;
  });

  if (!changed) {
    return Buffer.from(sourceDocx);
  }

  zip.file(MAIN_DOCUMENT_PART, new XMLSerializer().serializeToString(document));
  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE"
  });
}

/** Inline word diff in the `[-removed-]{+added+}` notation of `git diff --word-diff`. */
export function buildWordDiff(originalText: string, proposedText: string): string {
  return diffWords(originalText, proposedText)
    .map((part) => {
      if (part.added) {
        return `{+${part.value}+}`;
      }
      if (part.removed) {
        return `[-${part.value}-]`;
      }
      return part.value;
    })
    .join("");
}
