export const UNTITLED_PAPER = 'Untitled_Paper';

const TITLE_MARKER = /^title:/i;

export function extractTitle(paperText: string): string {
  for (const line of paperText.split('\n')) {
    const trimmed = line.trim();
    if (!TITLE_MARKER.test(trimmed)) {
      continue;
    }
    // First marker wins, even when it carries no text.
    const title = trimmed.slice('Title:'.length).trim();
    return title.length > 0 ? title : UNTITLED_PAPER;
  }
  return UNTITLED_PAPER;
}
