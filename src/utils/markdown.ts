/**
 * Helpers for Telegram's legacy Markdown parse mode.
 *
 * Legacy Markdown takes backslash escapes only outside entities and cannot
 * nest entities, so text placed inside `*bold*` or `[link](url)` needs its
 * own treatment.
 */

const LEGACY_MARKDOWN_SPECIALS = /([_*`[])/g;

/**
 * Backslash-escape the characters legacy Markdown treats as entity markers.
 * Only valid for text outside an entity.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(LEGACY_MARKDOWN_SPECIALS, '\\$1');
}

/**
 * Bold text. A literal `*` closes the entity, is escaped, and the entity is
 * reopened after it; empty segments get no markers.
 */
export function bold(text: string): string {
  return text
    .split('*')
    .map(segment => (segment ? `*${segment}*` : ''))
    .join('\\*');
}

/**
 * Inline link. Square brackets in the label become parentheses, since `]`
 * ends the label and escapes are not read inside it.
 */
export function link(label: string, url: string): string {
  return `[${label.replace(/\[/g, '(').replace(/]/g, ')')}](${url})`;
}

/**
 * Cut text to maxLength characters, appending an ellipsis when shortened
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
