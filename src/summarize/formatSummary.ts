const BULLET_LEAD_IN = /bullet points:/i;
const BULLET_MARKER = /^(?:[*\-•]|\d+[.)])\s+/;

/**
 * Models often answer with "Here are the bullet points:" followed by the
 * list. When that lead-in is present, only the list is kept and every
 * non-blank line becomes a `* ` bullet.
 */
export function formatSummary(raw: string): string {
  const match = BULLET_LEAD_IN.exec(raw);
  if (!match) {
    return raw.trim();
  }

  return raw
    .slice(match.index + match[0].length)
    .split('\n')
    .map((line) => line.trim().replace(BULLET_MARKER, ''))
    .filter((line) => line.length > 0)
    .map((line) => `* ${line}`)
    .join('\n');
}
