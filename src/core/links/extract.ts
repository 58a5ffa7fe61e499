/**
 * Link extraction from Markdown text.
 */

/**
 * A link target and the 1-based line it was found on.
 */
export interface MarkdownLink {
  target: string;
  line: number;
}

/** Inline links and images: [text](target), ![alt](target) */
const INLINE_LINK_PATTERN = /\[[^\]]*\]\(([^)]+)\)/g;

/** MyST include fences: ```{include} path */
const MYST_INCLUDE_PATTERN = /```\{include\}([^`\n]+)/g;

/**
 * Drop the single space that separates the directive from its argument.
 */
function includeTarget(raw: string): string {
  return raw.startsWith(' ') && !raw.startsWith('  ') ? raw.slice(1) : raw;
}

/**
 * Extract every inline link and MyST include target, in line order.
 * Targets are returned verbatim, surrounding whitespace included.
 */
export function extractLinks(content: string): MarkdownLink[] {
  const links: MarkdownLink[] = [];

  content.split(/\r?\n/).forEach((text, index) => {
    const line = index + 1;
    for (const match of text.matchAll(INLINE_LINK_PATTERN)) {
      links.push({ target: match[1], line });
    }
    for (const match of text.matchAll(MYST_INCLUDE_PATTERN)) {
      if (match[1].trim()) {
        links.push({ target: includeTarget(match[1]), line });
      }
    }
  });

  return links;
}
