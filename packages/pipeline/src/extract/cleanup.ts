function isPageFurniture(line: string): boolean {
  if (/^page\s+\d+(\s+of\s+\d+)?$/i.test(line)) return true;
  if (/^\d+\s+of\s+\d+$/i.test(line)) return true;
  if (/^\d{1,4}$/.test(line)) return true;
  if (line.length <= 80 && /^(www\.|https?:|doi:)/i.test(line)) return true;
  return false;
}

/**
 * Lines that repeat on many pages (running heads, journal names) plus page
 * numbers. Figure and table captions are never treated as furniture.
 */
function findRepeatedLines(lines: string[]): Set<string> {
  const frequency = new Map<string, number>();
  for (const raw of lines) {
    const line = raw.trim();
    if (!line || line.length > 120 || /[.!?:]$/.test(line)) continue;
    frequency.set(line, (frequency.get(line) ?? 0) + 1);
  }

  const threshold = Math.max(3, Math.floor(lines.length / 60));
  const repeated = new Set<string>();
  for (const [line, count] of frequency) {
    if (count >= threshold && !/^(figure|table|fig\.)\s*\d+/i.test(line)) {
      repeated.add(line);
    }
  }
  return repeated;
}

/** Normalizes raw extractor output into paragraphs separated by blank lines. */
export function cleanExtractedText(raw: string): string {
  const lines = raw.replace(/\r\n?/g, '\n').replace(/\u00a0/g, ' ').split('\n');
  const repeated = findRepeatedLines(lines);

  const kept = lines.filter((raw) => {
    const line = raw.trim();
    if (!line) return true;
    return !repeated.has(line) && !isPageFurniture(line);
  });

  return kept
    .join('\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/(\w)-\n(?=[a-z])/g, '$1')
    .replace(/([^\n])\n(?=[^\n])/g, '$1 ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function countNonWhitespace(text: string): number {
  return text.replace(/\s+/g, '').length;
}
