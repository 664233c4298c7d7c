/**
 * Run-span replacer
 * Finds a marker in the concatenated text of a paragraph and rewrites only the
 * fragments it spans, so a marker split across differently styled fragments is
 * still replaced and every untouched fragment keeps its text and formatting.
 */

import type { Fragment, Paragraph } from "./document-model";
import { createFragment, createParagraph, paragraphText } from "./document-model";
import type { TokenMap } from "./token-map";

interface FragmentSpan<F> {
  fragment: Fragment<F>;
  start: number;
  end: number;
}

export interface TokenMatch {
  token: string;
  value: string;
  start: number;
  end: number;
}

function buildSpans<F>(paragraph: Paragraph<F>): {
  text: string;
  spans: FragmentSpan<F>[];
} {
  const spans: FragmentSpan<F>[] = [];
  let offset = 0;
  for (const fragment of paragraph.fragments) {
    const end = offset + fragment.text.length;
    spans.push({ fragment, start: offset, end });
    offset = end;
  }
  return { text: paragraphText(paragraph), spans };
}

function findEarliest(text: string, tokenMap: TokenMap): TokenMatch | null {
  let best: TokenMatch | null = null;
  for (const [token, value] of tokenMap) {
    if (token.length === 0) continue;
    const start = text.indexOf(token);
    // strict comparison keeps the earlier key on ties
    if (start !== -1 && (best === null || start < best.start)) {
      best = { token, value, start, end: start + token.length };
    }
  }
  return best;
}

/**
 * Earliest occurrence of any key in the paragraph's visible text, or null
 */
export function locateToken<F>(
  paragraph: Paragraph<F>,
  tokenMap: TokenMap
): TokenMatch | null {
  return findEarliest(paragraphText(paragraph), tokenMap);
}

/**
 * Replaces the earliest token occurrence in the paragraph.
 * Returns false, without touching anything, when no key occurs.
 */
export function replaceOnce<F>(paragraph: Paragraph<F>, tokenMap: TokenMap): boolean {
  const { text, spans } = buildSpans(paragraph);
  const match = findEarliest(text, tokenMap);
  if (!match) {
    return false;
  }

  const affected = spans.filter(
    (span) => span.start < match.end && match.start < span.end
  );
  const first = affected[0];
  const last = affected[affected.length - 1];
  if (!first || !last) {
    return false;
  }

  const prefix = first.fragment.text.slice(0, match.start - first.start);
  const suffix = last.fragment.text.slice(match.end - last.start);

  if (first === last) {
    first.fragment.text = prefix + match.value + suffix;
    return true;
  }

  first.fragment.text = prefix + match.value;
  for (const span of affected.slice(1)) {
    span.fragment.text = "";
  }
  last.fragment.text = suffix;
  return true;
}

/**
 * Runs replaceOnce until no key is left in the paragraph.
 * A value that contains a key is expanded again on the next pass.
 */
export function replaceInParagraph<F>(
  paragraph: Paragraph<F>,
  tokenMap: TokenMap
): number {
  let count = 0;
  while (replaceOnce(paragraph, tokenMap)) {
    count++;
  }
  return count;
}

/**
 * Substitutes tokens in a plain string with the same fixed-point rules
 */
export function renderTokens(text: string, tokenMap: TokenMap): string {
  const paragraph = createParagraph([createFragment(text)]);
  replaceInParagraph(paragraph, tokenMap);
  return paragraphText(paragraph);
}
