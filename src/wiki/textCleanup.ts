/**
 * Text clean-up applied to page extracts before they are cached.
 */

const MAINTENANCE_NOTES = [
  /^Sub-Pages:[A-Za-z0-9]+\s*/,
  /This section requires expanding\. Click here to add more\.\S*/g,
  /This article requires cleanup\./g
];

/**
 * Strip maintenance notes and markup, collapse whitespace and drop sentences
 * repeated verbatim (case-insensitive).
 */
export const cleanDescription = (text: string): string => {
  if (!text) {
    return text;
  }

  let cleaned = text;
  for (const pattern of MAINTENANCE_NOTES) {
    cleaned = cleaned.replace(pattern, '');
  }
  cleaned = cleaned
    .replace(/<[^>]+>/g, '')
    .replace(/\s+/g, ' ');

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const sentence of cleaned.split('. ')) {
    const normalized = sentence.toLowerCase();
    if (!seen.has(normalized)) {
      seen.add(normalized);
      unique.push(sentence);
    }
  }

  return unique.join('. ').trim();
};

/** Keep at most `maxSentences` sentences, ending the result with a period. */
export const limitSentences = (text: string, maxSentences: number): string => {
  const sentences = text.split('. ');
  if (sentences.length <= maxSentences) {
    return text;
  }
  return `${sentences.slice(0, maxSentences).join('. ')}.`;
};

export interface ExtractSection {
  title: string;
  content: string;
}

const HEADING = /^(={2,6})\s*(.+?)\s*\1$/;

/**
 * Split a plain-text extract written with wiki-style headings (`== History ==`)
 * into its lead text and titled sections.
 */
export const splitExtract = (extract: string): { lead: string; sections: ExtractSection[] } => {
  const lead: string[] = [];
  const sections: ExtractSection[] = [];
  let current: { title: string; lines: string[] } | null = null;

  for (const line of extract.split('\n')) {
    const heading = HEADING.exec(line.trim());
    if (heading?.[2]) {
      if (current) {
        sections.push({ title: current.title, content: current.lines.join('\n').trim() });
      }
      current = { title: heading[2], lines: [] };
    } else if (current) {
      current.lines.push(line);
    } else {
      lead.push(line);
    }
  }
  if (current) {
    sections.push({ title: current.title, content: current.lines.join('\n').trim() });
  }

  return { lead: lead.join('\n').trim(), sections };
};
