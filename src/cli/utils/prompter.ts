/**
 * Readline Prompter
 *
 * Terminal implementation of the review session's input/output seam, built
 * on Node's readline. Ctrl+C aborts the prompter's signal; the pending
 * question resolves as a quit so the session loop can stop cleanly.
 */

import * as readline from 'readline/promises';
import type { VocabCard } from '@/core/models';
import type { CardPromptReply, RatingOutcome, ReviewPrompter } from '@/core/review';
import { isQuitToken } from '@/core/review';
import type { InvalidRatingError } from '@/core/scheduler';
import { bold, cyan, dim, formatPhase, green, red, yellow } from './terminal';

/**
 * A prompter the CLI can also use for yes/no questions, and must close.
 */
export interface InteractivePrompter extends ReviewPrompter {
  /** Aborted when the learner presses Ctrl+C */
  readonly signal: AbortSignal;

  confirm(question: string): Promise<boolean>;

  close(): void;
}

export class ReadlinePrompter implements InteractivePrompter {
  private readonly rl: readline.Interface;
  private readonly controller = new AbortController();

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('SIGINT', () => {
      this.controller.abort();
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  async presentCard(card: VocabCard, position: number, total: number): Promise<CardPromptReply> {
    console.log(`${dim(`[${position}/${total}]`)} ${dim(`[${formatPhase(card.schedule)}]`)} Word: ${bold(card.word)}`);
    const answer = await this.ask(dim('  [Press Enter to see meaning, q to quit] '));
    return isQuitToken(answer) ? 'quit' : 'reveal';
  }

  revealAnswer(card: VocabCard): void {
    const pos = card.partOfSpeech ? `(${card.partOfSpeech}) ` : '';
    console.log(`  ${pos}${cyan(card.meaning)}`);
    if (card.translation) {
      console.log(`  ${dim(card.translation)}`);
    }
    console.log();
  }

  askRating(): Promise<string> {
    return this.ask('  Your rating (1/2/3/q): ');
  }

  showFeedback(outcome: RatingOutcome): void {
    const color = outcome.event.kind === 'reset' || outcome.event.kind === 'relearn' ? yellow : green;
    console.log(`  -> ${color(outcome.feedback)}\n`);
  }

  showInvalidRating(error: InvalidRatingError): void {
    console.log(red(`  ${error.message}`));
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} (y/N) `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  }

  close(): void {
    this.rl.close();
  }

  private async ask(query: string): Promise<string> {
    if (this.controller.signal.aborted) return 'q';
    try {
      return await this.rl.question(query, { signal: this.controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return 'q';
      }
      throw error;
    }
  }
}
