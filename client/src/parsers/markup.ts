/**
 * Minimal tag scanner for the service's HTML pages.
 *
 * Matches elements by tag name and exact attribute values, the way the
 * pages are laid out (fixed `width`/`height`/`x` attributes on layout
 * tags). Nested elements of the same tag are balanced; comments are not
 * part of the document tree and are read separately.
 *
 * @module parsers/markup
 */

export interface MarkupElement {
  tag: string;
  attrs: Record<string, string>;
  /** Markup between the opening and closing tag. */
  inner: string;
  /** Tag-free, entity-decoded, whitespace-collapsed text. */
  text: string;
}

/** `true` matches any value; a string must match exactly. */
export type AttrFilter = Record<string, string | true>;

const ATTR_REGEX = /([^\s=\/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+)))?/g;

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: " ",
};

/** Null, surrogate and out-of-range code points become U+FFFD. */
function fromCodePoint(code: number): string {
  if (!Number.isSafeInteger(code) || code === 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
    return "\uFFFD";
  }
  return String.fromCodePoint(code);
}

export function decodeEntities(input: string): string {
  return input.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, entity: string) => {
    if (entity.startsWith("#x")) return fromCodePoint(parseInt(entity.slice(2), 16));
    if (entity.startsWith("#")) return fromCodePoint(parseInt(entity.slice(1), 10));
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]*>/g, " ")).replace(/\s+/g, " ").trim();
}

/** Remove `<!-- ... -->` blocks so markup inside them is not matched. */
export function stripComments(html: string): string {
  return html.replace(/<!--[\s\S]*?-->/g, "");
}

/** Contents of every `<!-- ... -->` block, in document order. */
export function findComments(html: string): string[] {
  const comments: string[] = [];
  const regex = /<!--([\s\S]*?)-->/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(html)) !== null) {
    comments.push(match[1]);
  }
  return comments;
}

export function parseAttributes(source: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  const regex = new RegExp(ATTR_REGEX.source, "g");
  let match: RegExpExecArray | null;
  while ((match = regex.exec(source)) !== null) {
    const name = match[1].toLowerCase();
    const value = match[2] ?? match[3] ?? match[4] ?? "";
    if (!(name in attrs)) {
      attrs[name] = decodeEntities(value);
    }
  }
  return attrs;
}

function matchesFilter(attrs: Record<string, string>, filter: AttrFilter): boolean {
  for (const [name, expected] of Object.entries(filter)) {
    const actual = attrs[name.toLowerCase()];
    if (actual === undefined) return false;
    if (expected !== true && actual !== expected) return false;
  }
  return true;
}

function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Index just past the closing tag balancing an opening tag that ended at `from`. */
function findClose(html: string, tag: string, from: number): { innerEnd: number; end: number } {
  const token = new RegExp(`<(/?)${escapeRegex(tag)}\\b[^>]*?(/?)>`, "gi");
  token.lastIndex = from;
  let depth = 1;
  let match: RegExpExecArray | null;
  while ((match = token.exec(html)) !== null) {
    const closing = match[1] === "/";
    const selfClosing = match[2] === "/";
    if (closing) {
      depth--;
      if (depth === 0) {
        return { innerEnd: match.index, end: match.index + match[0].length };
      }
    } else if (!selfClosing) {
      depth++;
    }
  }
  return { innerEnd: html.length, end: html.length };
}

/**
 * Every `<tag>` whose attributes satisfy `filter`, in document order.
 * Elements nested inside a match are still reported on their own.
 */
export function findElements(html: string, tag: string, filter: AttrFilter = {}): MarkupElement[] {
  const results: MarkupElement[] = [];
  const open = new RegExp(`<${escapeRegex(tag)}\\b([^>]*?)(/?)>`, "gi");
  let match: RegExpExecArray | null;
  while ((match = open.exec(html)) !== null) {
    const attrs = parseAttributes(match[1]);
    if (!matchesFilter(attrs, filter)) continue;

    const contentStart = match.index + match[0].length;
    let inner = "";
    if (match[2] !== "/") {
      const { innerEnd } = findClose(html, tag, contentStart);
      inner = html.slice(contentStart, innerEnd);
    }
    results.push({ tag: tag.toLowerCase(), attrs, inner, text: stripTags(inner) });
  }
  return results;
}

/** First match of {@link findElements}, or `undefined`. */
export function findElement(html: string, tag: string, filter: AttrFilter = {}): MarkupElement | undefined {
  return findElements(html, tag, filter)[0];
}
