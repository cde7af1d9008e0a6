/**
 * Prompt templates for layered summarization.
 *
 * Every resource is described at three fidelities:
 *
 *   L0 abstract: one short paragraph, enough to decide relevance
 *   L1 overview: navigable outline of what the resource contains and where
 *   L2 content:  the resource itself, never produced by a model
 */

export type SummarizeMode = 'document' | 'chunk' | 'merge' | 'image';

export const SUMMARIZE_SYSTEM_PROMPT = `You are a context layering module inside a knowledge store. You write compact, faithful descriptions of resources so that an AI agent can decide what to read without opening them.

## Output
Respond with ONE JSON object and nothing else:
{"abstract": "...", "overview": "..."}

## abstract (L0)
- At most {abstractTokens} tokens, plain prose, no markdown.
- Say what the resource is and what it is about. Name concrete entities, dates and decisions.

## overview (L1)
- At most {overviewTokens} tokens of markdown.
- Start with one sentence of purpose, then a heading per major part of the resource with 1-3 bullet points each.
- Keep the order of the resource so headings act as navigation anchors.
- Never invent content that is not in the resource.`;

const MODE_INSTRUCTIONS: Record<SummarizeMode, string> = {
  document: 'Describe the following resource.',
  chunk: 'The following is ONE PART of a longer resource. Describe only this part.',
  merge: 'The following are abstracts of consecutive parts of one resource. Write the abstract and overview of the WHOLE resource.',
  image: 'Describe the attached image: what it shows, any visible text, and what it would be useful for.',
};

export function buildSystemPrompt(abstractTokens: number, overviewTokens: number): string {
  return SUMMARIZE_SYSTEM_PROMPT
    .replace('{abstractTokens}', String(abstractTokens))
    .replace('{overviewTokens}', String(overviewTokens));
}

export function buildSummarizePrompt(mode: SummarizeMode, text: string, title?: string): string {
  const header = title ? `Resource: ${title}\n\n` : '';
  const body = text ? `\n\n<content>\n${text}\n</content>` : '';
  return `${header}${MODE_INSTRUCTIONS[mode]}${body}`;
}
