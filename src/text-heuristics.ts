import type { NoiseLists } from "./contracts.js";
import type { ChatMessage } from "./types.js";

export function firstLine(text: string): string {
  return text.trim().split("\n")[0]?.trim() ?? "";
}

export function splitLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function uniqueCapped(values: Iterable<string>, max = Number.POSITIVE_INFINITY): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const value of values) {
    if (output.length >= max) {
      break;
    }
    if (!seen.has(value)) {
      seen.add(value);
      output.push(value);
    }
  }
  return output;
}

// Notebooks

export function notebookTitlesFromCards(cardTexts: string[], noise: NoiseLists): string[] {
  const titles: string[] = [];
  for (const text of cardTexts) {
    const title = firstLine(text);
    if (title && !noise.notebookTitles.includes(title)) {
      titles.push(title);
    }
  }
  return uniqueCapped(titles);
}

/**
 * Home page fallback: a notebook title is the line right above its creation
 * date.
 */
export function notebookTitlesFromPageText(pageText: string, noise: NoiseLists): string[] {
  const datePattern = new RegExp(noise.notebookDatePattern);
  const lines = pageText.split("\n").map((line) => line.trim());
  const titles: string[] = [];

  lines.forEach((line, index) => {
    if (index === 0 || !datePattern.test(line)) {
      return;
    }
    const previous = lines[index - 1] ?? "";
    if (previous.length > 2 && !noise.notebookTitles.includes(previous)) {
      titles.push(previous);
    }
  });
  return uniqueCapped(titles);
}

// Sources

function isSourceUiLabel(line: string, noise: NoiseLists, matchPrefix: boolean): boolean {
  const lower = line.toLowerCase();
  const labelHit = noise.sourceLabels.some((label) => {
    const candidate = label.toLowerCase();
    return lower === candidate || (matchPrefix && lower.startsWith(`${candidate} `));
  });
  if (labelHit) {
    return true;
  }
  return noise.sourcePrompts.some((prompt) => lower.includes(prompt.toLowerCase()));
}

export function sourceNamesFromItems(itemTexts: string[], noise: NoiseLists): string[] {
  const names: string[] = [];
  for (const text of itemTexts) {
    const name = firstLine(text);
    if (name.length > 5 && !isSourceUiLabel(name, noise, false)) {
      names.push(name);
    }
  }
  return uniqueCapped(names);
}

const DOCUMENT_EXTENSIONS = [".pdf", ".docx", ".txt", ".md"];

/**
 * Side panel fallback: keeps lines shaped like file names or titles.
 */
export function sourceNamesFromPanelText(panelText: string, noise: NoiseLists): string[] {
  const names: string[] = [];
  for (const line of splitLines(panelText)) {
    if (line.length <= 5 || isSourceUiLabel(line, noise, true)) {
      continue;
    }
    const lower = line.toLowerCase();
    const looksLikeTitle =
      line.includes(".") ||
      line.includes("-") ||
      line.length > 15 ||
      DOCUMENT_EXTENSIONS.some((extension) => lower.includes(extension));
    if (looksLikeTitle) {
      names.push(line);
    }
  }
  return uniqueCapped(names);
}

// Search results

export function searchResultsFromPageText(pageText: string, noise: NoiseLists): string[] {
  const results: string[] = [];
  for (const line of splitLines(pageText)) {
    if (line.length < 20 || line.length > 300) {
      continue;
    }
    const lower = line.toLowerCase();
    if (noise.searchResultLines.some((word) => lower.includes(word.toLowerCase()))) {
      continue;
    }
    if (noise.resultTitleHints.some((hint) => lower.includes(hint))) {
      results.push(line);
    }
  }
  return uniqueCapped(results);
}

export function searchResultsFromTitleTexts(texts: string[], noise: NoiseLists): string[] {
  const results: string[] = [];
  for (const text of texts) {
    for (const line of splitLines(text)) {
      const title = stripTypePrefix(line, noise);
      if (title.length <= 5 || noise.searchResultLines.includes(title.toLowerCase())) {
        continue;
      }
      results.push(title);
    }
  }
  return uniqueCapped(results);
}

function stripTypePrefix(line: string, noise: NoiseLists): string {
  for (const token of noise.resultTypeTokens) {
    if (line.startsWith(`${token} `)) {
      return line.slice(token.length + 1).trim();
    }
  }
  return line;
}

export interface ParsedResultRow {
  title: string;
  sourceType: string;
}

/**
 * A result row shows a type glyph ("web", "drive_pdf", ...) and the title on
 * separate lines; the "select all" row has no title line and yields nothing.
 */
export function parseResultRow(rowText: string, noise: NoiseLists): ParsedResultRow | undefined {
  let sourceType = "unknown";
  let title = "";
  for (const line of splitLines(rowText)) {
    if (noise.resultTypeTokens.includes(line)) {
      sourceType = line;
    } else if (!title && line.length > 10 && !line.startsWith("选择") && !line.includes("来源")) {
      title = line;
    }
  }
  return title ? { title: title.slice(0, 100), sourceType } : undefined;
}

export function resultTitlesFromPanelText(panelText: string, noise: NoiseLists): string[] {
  const titles: string[] = [];
  for (const line of splitLines(panelText)) {
    if (line.length > 20 && !noise.resultPanelLines.some((word) => line.includes(word))) {
      titles.push(line.slice(0, 100));
    }
  }
  return uniqueCapped(titles);
}

// Chat

export function isPendingResponse(text: string, noise: NoiseLists): boolean {
  return noise.pendingResponseMarkers.some((marker) => text.includes(marker));
}

/**
 * Everything after the last context-loading placeholder, for when no response
 * element can be read.
 */
export function responseAfterMarker(areaText: string, noise: NoiseLists): string {
  const captured: string[] = [];
  let capturing = false;
  for (const line of areaText.split("\n")) {
    if (isPendingResponse(line, noise)) {
      capturing = true;
      captured.length = 0;
      continue;
    }
    if (capturing && line.trim()) {
      captured.push(line.trim());
    }
  }
  return captured.join("\n");
}

export function historyFromElements(texts: string[], noise: NoiseLists): ChatMessage[] {
  const history: ChatMessage[] = [];
  const seen = new Set<string>();
  for (const raw of texts) {
    const text = raw.trim();
    if (text.length <= 10 || seen.has(text)) {
      continue;
    }
    if (text.length < 50 && noise.historyFragments.some((fragment) => text.includes(fragment))) {
      continue;
    }
    seen.add(text);
    history.push({ role: text.length > 200 ? "assistant" : "user", content: text });
  }
  return history;
}

/**
 * Page text fallback: a line ending in a question mark opens a user turn, and
 * the lines between questions form the assistant reply.
 */
export function historyFromPageText(pageText: string, noise: NoiseLists): ChatMessage[] {
  const history: ChatMessage[] = [];
  let reply: string[] = [];

  const flushReply = () => {
    const content = reply.join("\n");
    if (content.length > 20) {
      history.push({ role: "assistant", content });
    }
    reply = [];
  };

  for (const line of splitLines(pageText)) {
    const isUi = noise.historyLines.some((entry) => line === entry || (line.length < 30 && line.includes(entry)));
    if (isUi || line.length < 5) {
      continue;
    }
    if (line.endsWith("?") || line.endsWith("？")) {
      flushReply();
      history.push({ role: "user", content: line });
    } else {
      reply.push(line);
    }
  }
  flushReply();
  return history;
}

export function dedupeHistory(messages: ChatMessage[], limit: number): ChatMessage[] {
  const seen = new Set<string>();
  const unique: ChatMessage[] = [];
  for (const message of messages) {
    const key = message.content.slice(0, 100);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(message);
  }
  return unique.slice(0, Math.max(0, limit));
}
