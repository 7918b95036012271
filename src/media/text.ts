// Glyph width is estimated at half the font size.
const CHAR_WIDTH_RATIO = 0.5;

/**
 * Greedy word wrap for caption overlays. A single word wider than the line
 * still gets a line of its own.
 */
export function wrapText(text: string, fontSize: number, maxWidth: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const candidate = [...current, word];
    if (current.length > 0 && candidate.join(' ').length * fontSize * CHAR_WIDTH_RATIO > maxWidth) {
      lines.push(current.join(' '));
      current = [word];
    } else {
      current = candidate;
    }
  }

  if (current.length > 0) {
    lines.push(current.join(' '));
  }

  return lines;
}
