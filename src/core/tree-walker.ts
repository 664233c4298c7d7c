/**
 * Tree replacement walker
 * Applies the run-span replacer to every paragraph reachable from a container:
 * nested table cells at any depth and, for a document root, every section's
 * headers and footers.
 */

import type { ReplacementTarget } from "./document-model";
import { paragraphText, traverseTree } from "./document-model";
import { replaceInParagraph } from "./run-span-replacer";
import type { TokenMap } from "./token-map";

export const DEFAULT_PLACEHOLDER_PATTERN = "\\{\\{[^{}]+\\}\\}";

/**
 * Replaces every occurrence of every key until no paragraph contains one.
 * Returns the number of replacements made; a clean tree yields 0.
 */
export function replaceAll<F>(target: ReplacementTarget<F>, tokenMap: TokenMap): number {
  let count = 0;
  traverseTree(target, {
    paragraph: (paragraph) => {
      count += replaceInParagraph(paragraph, tokenMap);
    },
  });
  return count;
}

/**
 * Distinct placeholder-looking strings still present, in traversal order
 */
export function findUnresolvedTokens<F>(
  target: ReplacementTarget<F>,
  pattern: string = DEFAULT_PLACEHOLDER_PATTERN
): string[] {
  const found = new Set<string>();
  traverseTree(target, {
    paragraph: (paragraph) => {
      const matcher = new RegExp(pattern, "g");
      for (const match of paragraphText(paragraph).matchAll(matcher)) {
        found.add(match[0]);
      }
    },
  });
  return [...found];
}
