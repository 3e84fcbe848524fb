const BAR_FULL = '█';
const BAR_EMPTY = '░';

/** One decimal place, the precision every score is shown at. */
export function formatScore(score: number): string {
  return score.toFixed(1);
}

/**
 * Horizontal bar for a 0-100 score. Values outside the range are clamped.
 */
export function scoreBar(score: number, width = 20): string {
  const filled = Math.round((Math.max(0, Math.min(100, score)) / 100) * width);
  return BAR_FULL.repeat(filled) + BAR_EMPTY.repeat(width - filled);
}

/**
 * Truncate to `max` code points, ending in an ellipsis when cut.
 */
export function truncate(text: string, max: number): string {
  const chars = [...text];
  if (chars.length <= max) return text;
  return chars.slice(0, Math.max(0, max - 1)).join('') + '…';
}

/** Display width: full-width (CJK) characters take two terminal columns. */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    width += /[\u1100-\u115f\u2e80-\ua4cf\uac00-\ud7a3\uf900-\ufaff\ufe30-\ufe4f\uff00-\uff60\uffe0-\uffe6]/.test(ch) ? 2 : 1;
  }
  return width;
}

/** Pad to a display width so mixed Japanese/ASCII columns line up. */
export function padDisplay(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - displayWidth(text)));
}

export function formatCount(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

/**
 * Keyword list for a table cell: as many as fit, then "+N".
 */
export function summarizeKeywords(keywords: readonly string[], maxShown = 3): string {
  const shown = keywords.slice(0, maxShown).join(', ');
  const rest = keywords.length - maxShown;
  return rest > 0 ? `${shown} +${rest}` : shown;
}
