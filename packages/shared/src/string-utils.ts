const MAX_SLUG_LENGTH = 50;

/**
 * Derives a branch- and filesystem-safe identifier from free text.
 * "Increase button contrast!" -> "increase-button-contrast"
 */
export const slugify = (text: string, maxLength: number = MAX_SLUG_LENGTH): string => {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/g, '');
  return slug || 'change';
};

/**
 * Shortens text for inclusion in error messages, marking the cut with an ellipsis.
 */
export const truncate = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
};

/**
 * Single-line, truncated view of raw upstream output.
 */
export const snippet = (text: string, maxLength = 200): string =>
  truncate(text.replace(/\s+/g, ' ').trim(), maxLength);
