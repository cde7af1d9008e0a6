import { estimateTokens, truncateToTokens } from '../utils/helpers.js';
import { splitParagraphs, splitSentences } from './extractive.js';

export interface Chunk {
  index: number;
  /** Nearest heading at or before the start of the chunk. */
  title?: string;
  text: string;
}

const HEADING_RE = /^#{1,6}\s+(.+?)\s*#*\s*$/;

function headingOf(paragraph: string): string | undefined {
  const firstLine = paragraph.split('\n', 1)[0] ?? '';
  return HEADING_RE.exec(firstLine)?.[1];
}

/** Break one oversized paragraph into pieces under the budget: sentences, then hard cuts. */
function splitOversized(paragraph: string, maxTokens: number): string[] {
  const pieces: string[] = [];
  let current = '';
  for (const sentence of splitSentences(paragraph)) {
    let rest = sentence;
    while (estimateTokens(rest) > maxTokens) {
      const head = truncateToTokens(rest, maxTokens).replace(/…$/, '');
      if (!head) break;
      if (current) {
        pieces.push(current);
        current = '';
      }
      pieces.push(head);
      rest = rest.slice(head.length).trimStart();
    }
    if (!rest) continue;
    const next = current ? `${current} ${rest}` : rest;
    if (estimateTokens(next) > maxTokens && current) {
      pieces.push(current);
      current = rest;
    } else {
      current = next;
    }
  }
  if (current) pieces.push(current);
  return pieces;
}

/**
 * Split text on paragraph boundaries into chunks of at most `maxTokens`. A heading
 * starts a new chunk once the current one is at least half full.
 */
export function chunkText(text: string, maxTokens: number): Chunk[] {
  const chunks: Chunk[] = [];
  let buffer: string[] = [];
  let bufferTokens = 0;
  let title: string | undefined;
  let bufferTitle: string | undefined;

  const flush = () => {
    if (buffer.length === 0) return;
    chunks.push({ index: chunks.length, title: bufferTitle, text: buffer.join('\n\n') });
    buffer = [];
    bufferTokens = 0;
  };

  for (const paragraph of splitParagraphs(text)) {
    const heading = headingOf(paragraph);
    if (heading) {
      if (bufferTokens >= maxTokens / 2) flush();
      title = heading;
    }
    const pieces = estimateTokens(paragraph) > maxTokens ? splitOversized(paragraph, maxTokens) : [paragraph];
    for (const piece of pieces) {
      const tokens = estimateTokens(piece);
      if (bufferTokens + tokens > maxTokens) flush();
      if (buffer.length === 0) bufferTitle = title;
      buffer.push(piece);
      bufferTokens += tokens;
    }
  }
  flush();
  return chunks;
}
