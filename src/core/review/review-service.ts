/**
 * Review Service
 *
 * Application service tying the word store to the review scheduler. Every
 * surface (CLI, HTTP API, review session) goes through it, so adding a
 * word and applying a rating behave the same everywhere.
 *
 * A rating is applied as load, schedule, persist: the scheduler computes the
 * next schedule from the stored one and the repository writes all schedule
 * fields in one statement. If the scheduler refuses the stored schedule,
 * nothing is written.
 *
 * @example
 * ```typescript
 * const service = new ReviewService(new VocabCardRepository(db), new SystemClock());
 *
 * await service.addWord({ word: 'diligent', meaning: 'Showing care and effort.' });
 * const [next] = await service.listDue();
 * const { feedback } = await service.submitRating(next.id, 'easy');
 * ```
 */

import type { VocabCard } from '../models';
import type { Clock, Rating, ReviewSchedulerConfig, TransitionEvent } from '../scheduler';
import { describeEvent, formatFeedback, ReviewScheduler } from '../scheduler';
import { CardNotFoundError, DuplicateWordError, ValidationError } from '../errors';
import type { VocabCardRepository, VocabCardStats } from '@/storage/repositories';

/**
 * Data needed to add a word.
 */
export interface AddWordInput {
  word: string;
  meaning: string;
  partOfSpeech?: string;
  translation?: string;
}

/**
 * Outcome of one rating.
 */
export interface RatingOutcome {
  /** The card as stored after the review */
  card: VocabCard;
  event: TransitionEvent;
  /** Feedback line for the learner, e.g. 'Step 2/3 - review in 10min' */
  feedback: string;
}

export class ReviewService {
  private readonly scheduler: ReviewScheduler;

  /**
   * @param repository - Word store
   * @param clock - Clock for due checks and deadlines (accelerated in test mode)
   * @param schedulerConfig - Optional scheduler overrides
   */
  constructor(
    private readonly repository: VocabCardRepository,
    private readonly clock: Clock,
    schedulerConfig?: Partial<ReviewSchedulerConfig>
  ) {
    this.scheduler = new ReviewScheduler(schedulerConfig);
  }

  /**
   * Adds a word at learning step 1, due one step-1 duration from now.
   *
   * @throws {ValidationError} If the word or meaning is blank
   * @throws {DuplicateWordError} If the word is already stored
   */
  async addWord(input: AddWordInput): Promise<VocabCard> {
    const word = input.word.trim();
    const meaning = input.meaning.trim();

    if (word.length === 0) {
      throw new ValidationError('Word must not be empty', { field: 'word' });
    }
    if (meaning.length === 0) {
      throw new ValidationError('Meaning must not be empty', { field: 'meaning' });
    }

    if (await this.repository.findByWord(word)) {
      throw new DuplicateWordError(word);
    }

    const card = await this.repository.create({
      id: `vc_${crypto.randomUUID()}`,
      word,
      meaning,
      partOfSpeech: input.partOfSpeech?.trim() ?? '',
      translation: input.translation?.trim() ?? '',
      schedule: this.scheduler.createInitialSchedule(this.clock),
    });

    console.log(`[review] Added '${card.word}' (${card.id})`);
    return card;
  }

  listAll(): Promise<VocabCard[]> {
    return this.repository.findAll();
  }

  /**
   * Cards due now, earliest first.
   */
  listDue(): Promise<VocabCard[]> {
    return this.repository.findDue(this.clock.now());
  }

  getStats(): Promise<VocabCardStats> {
    return this.repository.getStats(this.clock.now());
  }

  /**
   * @throws {CardNotFoundError}
   */
  async getCard(id: string): Promise<VocabCard> {
    const card = await this.repository.findById(id);
    if (!card) {
      throw new CardNotFoundError(id);
    }
    return card;
  }

  /**
   * @throws {CardNotFoundError}
   */
  async findByWord(word: string): Promise<VocabCard> {
    const card = await this.repository.findByWord(word);
    if (!card) {
      throw new CardNotFoundError(word.trim());
    }
    return card;
  }

  /**
   * Applies a rating to a card and persists the resulting schedule.
   *
   * Cards are not required to be due; an early review recomputes the
   * schedule from now.
   *
   * @throws {CardNotFoundError} If no card has this id
   * @throws {InconsistentStateError} If the stored schedule is corrupt
   */
  async submitRating(id: string, rating: Rating): Promise<RatingOutcome> {
    const current = await this.getCard(id);
    const { schedule, event } = this.scheduler.review(current.schedule, rating, this.clock);
    const card = await this.repository.updateSchedule(id, schedule);

    console.log(`[review] ${card.word}: ${rating} -> ${describeEvent(event)}`);

    return { card, event, feedback: formatFeedback(event) };
  }

  /**
   * @throws {CardNotFoundError}
   */
  async deleteCard(id: string): Promise<VocabCard> {
    const card = await this.getCard(id);
    await this.repository.delete(id);
    console.log(`[review] Deleted '${card.word}'`);
    return card;
  }

  /**
   * Removes every card.
   *
   * @returns Number of cards removed
   */
  async clearAll(): Promise<number> {
    const removed = await this.repository.deleteAll();
    console.log(`[review] Cleared ${removed} card(s)`);
    return removed;
  }

  /**
   * The clock this service schedules against.
   */
  getClock(): Clock {
    return this.clock;
  }
}
