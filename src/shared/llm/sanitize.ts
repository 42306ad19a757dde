/**
 * Output Sanitizing
 *
 * Generated text is rendered into plain-text documents and PDFs with
 * Latin-1 fonts, so markdown emphasis and typographic characters are
 * stripped or mapped to ASCII. `sanitizeGeneratedText` is idempotent.
 */

const CHARACTER_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/\u2013/g, '-'],
  [/\u2014/g, '--'],
  [/[\u2018\u2019\u201A\u2032]/g, "'"],
  [/[\u201C\u201D\u201E\u2033]/g, '"'],
  [/[\u2022\u25AA\u25CF\u2023\u2043]/g, '-'],
  [/\u2026/g, '...'],
  [/[\u00A0\u2007\u202F]/g, ' '],
  [/\u2122/g, '(TM)'],
  [/\u00AE/g, '(R)'],
  [/\u00A9/g, '(c)']
];

const UNDERSCORE_EMPHASIS = /(^|[\s(])_{1,2}([^_\s](?:[^_\n]*[^_\s])?)_{1,2}(?=[\s).,;:!?]|$)/g;

export function sanitizeGeneratedText(text: string): string {
  let result = text.replace(/\r\n?/g, '\n');

  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    result = result.replace(pattern, replacement);
  }

  result = result
    .replace(/[^\x00-\xFF]/gu, '?')
    .replace(/\*/g, '');

  // Unwrapping one pair can expose an enclosing pair
  let previous: string;
  do {
    previous = result;
    result = result.replace(UNDERSCORE_EMPHASIS, '$1$2');
  } while (result !== previous);

  return result.replace(/\n{3,}/g, '\n\n').trim();
}

// Markers as models write them: dashes, bullet and arrow glyphs, numbering
const LIST_MARKER = /^\s*(?:[-+*\u2013\u2014\u2022\u2192\u25AA\u25B8\u25CF]|\d+[.)])\s+/;

// The same markers once sanitized: en and em dashes become - and --
const SANITIZED_LIST_MARKER = /^\s*(?:-{1,2}|[+*]|\d+[.)])\s+/;

/**
 * Split a generated list into clean bullet strings, at most `max` of them
 */
export function parseBulletPoints(text: string, max: number = 5): string[] {
  return text
    .split('\n')
    .map(line => sanitizeGeneratedText(line.replace(LIST_MARKER, '')))
    .map(line => line.replace(SANITIZED_LIST_MARKER, '').trim())
    .filter(line => line.length > 0)
    .slice(0, max);
}

/**
 * Split a generated comma or newline separated skill list, dropping
 * case-insensitive duplicates while keeping first-seen spelling
 */
export function parseSkillList(text: string): string[] {
  const items = text
    .split(/[,\n]/)
    .map(item => sanitizeGeneratedText(item.replace(LIST_MARKER, '')))
    .map(item => item.replace(SANITIZED_LIST_MARKER, '').trim())
    .filter(item => item.length > 0);
  return mergeSkills(items, []);
}

/**
 * Case-insensitive union, existing entries first
 */
export function mergeSkills(existing: string[], additions: string[]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const skill of [...existing, ...additions]) {
    const trimmed = skill.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    merged.push(trimmed);
  }
  return merged;
}
