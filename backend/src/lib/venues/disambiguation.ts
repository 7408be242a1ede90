/**
 * What to do with a record whose best fuzzy candidates are plausible but not
 * certain. The session asks a Disambiguator; it never talks to a terminal.
 */

import { createInterface } from 'readline/promises';
import type { VenueRecord } from '@pub-catalog/shared';
import type { CandidateSummary } from './auditLog.js';

export type DisambiguationChoice =
  | { action: 'pick'; catalogId: string }
  | { action: 'create' }
  | { action: 'skip' };

export interface Disambiguator {
  presentCandidates(record: VenueRecord, candidates: CandidateSummary[]): Promise<DisambiguationChoice>;
}

/**
 * Unattended runs: never guess. The session logs the candidates for review.
 */
export class SkipDisambiguator implements Disambiguator {
  async presentCandidates(): Promise<DisambiguationChoice> {
    return { action: 'skip' };
  }
}

/**
 * Operator answer -> choice. "1".."N" picks, "n" creates, anything else skips.
 */
export function parseChoice(answer: string, candidates: CandidateSummary[]): DisambiguationChoice {
  const text = answer.trim().toLowerCase();
  if (/^\d+$/.test(text)) {
    const candidate = candidates[Number(text) - 1];
    if (candidate) return { action: 'pick', catalogId: candidate.catalogId };
    return { action: 'skip' };
  }
  if (text === 'n' || text === 'new') return { action: 'create' };
  return { action: 'skip' };
}

export function formatCandidatePrompt(record: VenueRecord, candidates: CandidateSummary[]): string {
  const lines = [
    '',
    `No confident match for: ${record.name}, ${record.address}`,
    ...candidates.map(
      (candidate, i) => `  ${i + 1}. ${candidate.name}, ${candidate.address} (score ${candidate.score})`
    ),
    `Choose 1-${candidates.length}, [n]ew or [s]kip: `,
  ];
  return lines.join('\n');
}

/** Minimal question/answer channel */
export interface Prompt {
  question(text: string): Promise<string>;
  close(): void;
}

export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = createInterface({ input, output });
  return {
    question: (text) => rl.question(text),
    close: () => rl.close(),
  };
}

/**
 * Asks an operator through a Prompt, one record at a time
 */
export class PromptDisambiguator implements Disambiguator {
  constructor(private readonly prompt: Prompt) {}

  async presentCandidates(record: VenueRecord, candidates: CandidateSummary[]): Promise<DisambiguationChoice> {
    const answer = await this.prompt.question(formatCandidatePrompt(record, candidates));
    return parseChoice(answer, candidates);
  }

  close(): void {
    this.prompt.close();
  }
}
