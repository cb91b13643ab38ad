/**
 * Review Session Loop
 *
 * Walks the learner through the cards that are due when the session starts:
 * show the word, wait for the reveal, show the answer, ask for a rating and
 * apply it. All terminal I/O goes through a ReviewPrompter, so the loop runs
 * the same against readline or a scripted prompter in tests.
 *
 * Stopping:
 * - 'q' or 'quit' at either prompt ends the session
 * - an aborted signal (Ctrl+C) ends it before the next step
 * Ratings already applied stay committed; the current card is left untouched.
 */

import type { VocabCard } from '../models';
import { InvalidRatingError, parseRating } from '../scheduler';
import type { RatingOutcome, ReviewService } from './review-service';

/** Tokens that end a session at any prompt. */
export const QUIT_TOKENS: readonly string[] = ['q', 'quit'];

/**
 * What the learner did at the card prompt.
 */
export type CardPromptReply = 'reveal' | 'quit';

/**
 * Input/output seam of a review session.
 */
export interface ReviewPrompter {
  /** Shows the word and waits until the learner asks to reveal it (or quits). */
  presentCard(card: VocabCard, position: number, total: number): Promise<CardPromptReply>;

  /** Shows meaning, part of speech and translation. */
  revealAnswer(card: VocabCard): void;

  /** Asks for a rating and returns the raw token typed. */
  askRating(card: VocabCard): Promise<string>;

  showFeedback(outcome: RatingOutcome): void;

  showInvalidRating(error: InvalidRatingError): void;
}

export interface ReviewSessionOptions {
  /** Aborting ends the session before its next step */
  signal?: AbortSignal;
}

export interface ReviewSessionSummary {
  /** Ratings applied during the session */
  reviewed: number;
  /** Cards that were due when the session started */
  total: number;
  /** True when every due card was rated */
  completed: boolean;
}

export function isQuitToken(token: string): boolean {
  return QUIT_TOKENS.includes(token.trim().toLowerCase());
}

/**
 * Runs one review session over the cards due at its start.
 *
 * Cards that become due during the session wait for the next one.
 */
export async function runReviewSession(
  service: ReviewService,
  prompter: ReviewPrompter,
  options: ReviewSessionOptions = {}
): Promise<ReviewSessionSummary> {
  const { signal } = options;
  const due = await service.listDue();
  const total = due.length;
  let reviewed = 0;

  const stop = (): ReviewSessionSummary => ({ reviewed, total, completed: false });

  for (const [index, card] of due.entries()) {
    if (signal?.aborted) return stop();

    const reply = await prompter.presentCard(card, index + 1, total);
    if (reply === 'quit' || signal?.aborted) return stop();

    prompter.revealAnswer(card);

    let outcome: RatingOutcome | null = null;
    while (outcome === null) {
      const token = await prompter.askRating(card);
      if (signal?.aborted || isQuitToken(token)) return stop();

      try {
        outcome = await service.submitRating(card.id, parseRating(token));
      } catch (error) {
        if (!(error instanceof InvalidRatingError)) throw error;
        prompter.showInvalidRating(error);
      }
    }

    reviewed++;
    prompter.showFeedback(outcome);
  }

  return { reviewed, total, completed: true };
}
