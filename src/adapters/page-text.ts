/**
 * Page text layout
 * Rebuilds reading-order text from positioned text items: items whose tops are
 * close form a line, lines run top to bottom, items within a line left to right.
 */

import type { SourceDocumentText } from "../types";

export interface PositionedText {
  text: string;
  x: number;
  /** Distance from the top edge of the page to the top of the item */
  top: number;
  width: number;
  height: number;
}

export interface LayoutOptions {
  xTolerance: number;
  yTolerance: number;
}

interface Line {
  top: number;
  items: PositionedText[];
}

function groupLines(items: PositionedText[], yTolerance: number): Line[] {
  const sorted = [...items].sort((a, b) => a.top - b.top || a.x - b.x);
  const lines: Line[] = [];

  for (const item of sorted) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(item.top - current.top) <= yTolerance) {
      current.items.push(item);
    } else {
      lines.push({ top: item.top, items: [item] });
    }
  }

  return lines;
}

function joinLine(items: PositionedText[], xTolerance: number): string {
  const ordered = [...items].sort((a, b) => a.x - b.x);
  let text = "";
  let previousEnd: number | null = null;

  for (const item of ordered) {
    if (
      previousEnd !== null &&
      item.x - previousEnd > xTolerance &&
      !/\s$/.test(text) &&
      !/^\s/.test(item.text)
    ) {
      text += " ";
    }
    text += item.text;
    previousEnd = item.x + item.width;
  }

  return text;
}

export function layoutTextItems(
  items: PositionedText[],
  options: LayoutOptions
): string {
  const visible = items.filter((item) => item.text.length > 0);
  return groupLines(visible, options.yTolerance)
    .map((line) => joinLine(line.items, options.xTolerance))
    .join("\n");
}

/**
 * Items whose top edge lies within `height` points of the page top
 */
export function cropTop(items: PositionedText[], height: number): PositionedText[] {
  return items.filter((item) => item.top < height);
}

/**
 * Assembles the texts the field extractors read from per-page items
 */
export function buildSourceText(
  pages: PositionedText[][],
  options: LayoutOptions & { headerCropHeight: number }
): SourceDocumentText {
  const pageTexts = pages.map((items) => layoutTextItems(items, options));
  const firstPage = pages[0] ?? [];

  return {
    firstPageText: pageTexts[0] ?? "",
    firstPageHeaderText: layoutTextItems(
      cropTop(firstPage, options.headerCropHeight),
      options
    ),
    lastPageText: pageTexts[pageTexts.length - 1] ?? "",
    fullText: pageTexts.join("\n"),
  };
}
