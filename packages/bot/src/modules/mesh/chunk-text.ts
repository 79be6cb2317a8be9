/**
 * Découpe un texte pour la charge utile radio. On coupe d'abord aux retours à la
 * ligne, puis aux espaces, et en dernier recours au milieu d'un mot.
 */
export function chunkText(text: string, maxLength: number): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (trimmed.length <= maxLength) return [trimmed];

  const chunks: string[] = [];
  let current = '';
  for (const line of trimmed.split('\n')) {
    for (const piece of splitLine(line, maxLength)) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length <= maxLength) {
        current = candidate;
      } else {
        if (current) chunks.push(current);
        current = piece;
      }
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

function splitLine(line: string, maxLength: number): string[] {
  if (line.length <= maxLength) return [line];
  const out: string[] = [];
  let current = '';
  for (const word of line.split(' ')) {
    if (word.length > maxLength) {
      if (current) out.push(current);
      current = '';
      for (let i = 0; i < word.length; i += maxLength) out.push(word.slice(i, i + maxLength));
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= maxLength) {
      current = candidate;
    } else {
      out.push(current);
      current = word;
    }
  }
  if (current) out.push(current);
  return out;
}
