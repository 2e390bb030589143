const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;
const ELLIPSIS = '...';
const WRAP_MIN_RATIO = 0.6;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  return decodeHtmlEntities(value.replace(TAG_RE, ' '))
    .replace(WS_RE, ' ')
    .trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `term` occurs in `text` bounded by non-alphanumerics, so "ai"
 * matches "AI safety" but not "maintain". Both sides are compared lower-cased.
 */
export function containsWord(text: string, term: string): boolean {
  const needle = term.trim().toLowerCase();
  if (!needle || !text) {
    return false;
  }
  const pattern = new RegExp(
    `(?:^|[^a-z0-9])${escapeRegExp(needle)}(?:$|[^a-z0-9])`,
  );
  return pattern.test(text.toLowerCase());
}

/**
 * Splits a title into at most two display lines, breaking at the last space
 * before `limit` when it falls past 60% of the limit; otherwise the title is
 * cut at `limit`.
 */
export function wrapForMobile(text: string, limit: number): string[] {
  if (text.length <= limit || limit <= 0) {
    return [text];
  }

  const head = text.slice(0, limit);
  if (text.charAt(limit) === ' ') {
    return [head, text.slice(limit + 1)];
  }
  const lastSpace = head.lastIndexOf(' ');
  if (lastSpace > limit * WRAP_MIN_RATIO) {
    return [text.slice(0, lastSpace), text.slice(lastSpace + 1)];
  }
  return [head, text.slice(limit)];
}

export function formatTitleForMobile(text: string, limit: number): string {
  return wrapForMobile(text, limit).join('\n  ');
}

/**
 * Cuts `text` to at most `limit` characters ending in "...", dropping the
 * partial trailing word.
 */
export function truncateAtWord(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  const room = Math.max(0, limit - ELLIPSIS.length);
  const head = text.slice(0, room);
  if (text.charAt(room) === ' ') {
    return `${head.trimEnd()}${ELLIPSIS}`;
  }

  const lastSpace = head.lastIndexOf(' ');
  const cut = lastSpace > 0 ? head.slice(0, lastSpace) : head;
  return `${cut.trimEnd()}${ELLIPSIS}`;
}

/** Chat link markup, or '' when there is no usable URL. */
export function chatLink(url: string | null | undefined, label: string): string {
  const trimmed = (url ?? '').trim();
  if (!trimmed) {
    return '';
  }
  return `<${trimmed}|${label}>`;
}

export function formatIssueCodes(issueCodes: readonly string[]): string {
  return issueCodes.length > 0 ? issueCodes.join('/') : 'None';
}

export function slugify(value: string): string {
  return (
    value
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '') || 'unknown'
  );
}

export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
