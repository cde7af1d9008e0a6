import { estimateTokens, truncateToTokens } from '../utils/helpers.js';

const HEADING_RE = /^(#{1,6})\s+(.+?)\s*#*\s*$/;

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .filter(p => p.length > 0);
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?。！？])\s+/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/** Plain-text rendering of light markdown: fences, heading marks, emphasis and links. */
export function stripMarkdown(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/[*_`~]+/g, '')
    .replace(/[ \t]+/g, ' ')
    .trim();
}

function isHeading(paragraph: string): boolean {
  return paragraph.split('\n').every(line => HEADING_RE.test(line));
}

/**
 * Leading sentences of the first prose paragraphs, within `maxTokens`.
 */
export function extractiveAbstract(text: string, maxTokens: number): string {
  const sentences: string[] = [];
  for (const paragraph of splitParagraphs(text)) {
    if (isHeading(paragraph)) continue;
    sentences.push(...splitSentences(stripMarkdown(paragraph).replace(/\n/g, ' ')));
    if (sentences.length >= 8) break;
  }
  if (sentences.length === 0) return truncateToTokens(stripMarkdown(text), maxTokens);

  let out = '';
  for (const sentence of sentences) {
    const next = out ? `${out} ${sentence}` : sentence;
    if (estimateTokens(next) > maxTokens) break;
    out = next;
  }
  return out || truncateToTokens(sentences[0] ?? '', maxTokens);
}

interface Section {
  level: number;
  title: string;
  body: string[];
}

function collectSections(text: string): Section[] {
  const sections: Section[] = [];
  let current: Section | undefined;
  for (const line of text.replace(/\r\n/g, '\n').split('\n')) {
    const m = HEADING_RE.exec(line);
    if (m?.[1] && m[2]) {
      current = { level: m[1].length, title: m[2], body: [] };
      sections.push(current);
    } else if (current) {
      current.body.push(line);
    }
  }
  return sections;
}

/**
 * Outline of the document: every heading with the first sentence of its body, or the
 * leading paragraphs when the text has no headings.
 */
export function extractiveOverview(text: string, maxTokens: number): string {
  const sections = collectSections(text);
  const lines: string[] = [];

  if (sections.length > 0) {
    for (const section of sections) {
      lines.push(`${'#'.repeat(section.level)} ${section.title}`);
      const [firstParagraph] = splitParagraphs(section.body.join('\n'));
      const [lead] = firstParagraph ? splitSentences(stripMarkdown(firstParagraph).replace(/\n/g, ' ')) : [];
      if (lead) lines.push(lead);
    }
  } else {
    lines.push(...splitParagraphs(text).map(p => stripMarkdown(p)));
  }

  let out = '';
  for (const line of lines) {
    const next = out ? `${out}\n${line}` : line;
    if (estimateTokens(next) > maxTokens) {
      return out || truncateToTokens(line, maxTokens);
    }
    out = next;
  }
  return out;
}
