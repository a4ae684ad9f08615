// packages/erd/src/text.ts

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Greedy soft wrap on whitespace. Whitespace runs collapse to one space;
 * a word longer than `width` is cut into `width`-sized pieces.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let cur = '';
  for (let word of words) {
    while (word.length > width) {
      const room = cur ? width - cur.length - 1 : width;
      if (room <= 0) { lines.push(cur); cur = ''; continue; }
      lines.push(cur ? `${cur} ${word.slice(0, room)}` : word.slice(0, room));
      cur = '';
      word = word.slice(room);
    }
    if (!cur) cur = word;
    else if (cur.length + 1 + word.length <= width) cur += ' ' + word;
    else { lines.push(cur); cur = word; }
  }
  if (cur) lines.push(cur);
  return lines;
}
