export const TRUNCATION_MARKER = '…';

/**
 * Truncates to at most `maxLength` code points. A truncated result ends with
 * the marker and is exactly `maxLength` long.
 */
export function truncateText(text: string, maxLength: number, marker: string = TRUNCATION_MARKER): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;

  const markerLength = Array.from(marker).length;
  return chars.slice(0, Math.max(0, maxLength - markerLength)).join('') + marker;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Wraps text on word boundaries; words longer than `width` get a line of their own.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(w => w.length > 0)) {
    if (current && current.length + 1 + word.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = current ? `${current} ${word}` : word;
    }
  }

  if (current) lines.push(current);
  return lines;
}

export function lastPathSegment(url: string): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(s => s.length > 0);
    return segments[segments.length - 1] ?? '';
  } catch {
    return '';
  }
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}
