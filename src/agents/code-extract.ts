import type { ProjectLanguage } from "../config";
import { sourceFileName } from "./roles";

const FENCE = /```([A-Za-z0-9_+-]*)([^\n]*)\n([\s\S]*?)```/g;
const SOURCE_NAME = /^[A-Za-z_][A-Za-z0-9_]*\.(?:kt|java)$/;

type CodeBlock = {
  language: string;
  code: string;
  fileName?: string;
};

export type SourceFile = {
  name: string;
  contents: string;
};

// A label is a line that holds nothing but a file name, optionally as "File: X.kt" or wrapped in markdown.
function labelName(line: string): string | undefined {
  const bare = line
    .trim()
    .replace(/^(?:[#>*`\s-]|\/\/)+/, "")
    .replace(/^file(?:name)?\s*:\s*/i, "")
    .replace(/[*`:\s]+$/, "");
  return SOURCE_NAME.test(bare) ? bare : undefined;
}

function precedingLine(response: string, index: number): string {
  const lines = response.slice(0, index).split("\n");
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    if (lines[i].trim()) {
      return lines[i];
    }
  }
  return "";
}

export function extractCodeBlocks(response: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  for (const match of response.matchAll(FENCE)) {
    const block: CodeBlock = { language: match[1].toLowerCase(), code: match[3] };
    const fileName = labelName(match[2]) ?? labelName(precedingLine(response, match.index ?? 0));
    if (fileName) {
      block.fileName = fileName;
    }
    blocks.push(block);
  }
  return blocks;
}

function pickBlock(blocks: CodeBlock[], language: string): string {
  const aliases = language === "kotlin" ? ["kotlin", "kt"] : [language];
  const preferred = blocks.filter((block) => aliases.includes(block.language));
  const pool = preferred.length > 0 ? preferred : blocks;
  const longest = pool.reduce((best, block) => (block.code.length > best.code.length ? block : best));
  return ensureTrailingNewline(longest.code.trimEnd());
}

// Prefers a fenced block in the requested language, then the longest block, then the raw text.
export function extractCode(response: string, language: string): string {
  const blocks = extractCodeBlocks(response);
  if (blocks.length === 0) {
    return ensureTrailingNewline(response.trim());
  }
  return pickBlock(blocks, language);
}

/**
 * Splits a coder response into source files. Blocks labelled with a file name in the project's
 * language become one file each (the last block wins on a repeated name); an unlabelled response
 * becomes the main activity. The main activity, when present, comes first.
 */
export function extractSourceFiles(response: string, language: ProjectLanguage): SourceFile[] {
  const mainName = sourceFileName(language);
  const extension = language === "java" ? ".java" : ".kt";
  const blocks = extractCodeBlocks(response);
  const named = new Map<string, string>();
  for (const block of blocks) {
    if (block.fileName?.endsWith(extension)) {
      named.set(block.fileName, ensureTrailingNewline(block.code.trimEnd()));
    }
  }
  if (named.size === 0) {
    return [{ name: mainName, contents: extractCode(response, language) }];
  }
  if (!named.has(mainName)) {
    const unlabelled = blocks.filter((block) => !block.fileName);
    if (unlabelled.length > 0) {
      named.set(mainName, pickBlock(unlabelled, language));
    }
  }
  const ordered = Array.from(named.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const main = ordered.filter(([name]) => name === mainName);
  const rest = ordered.filter(([name]) => name !== mainName);
  return [...main, ...rest].map(([name, contents]) => ({ name, contents }));
}

function ensureTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}
