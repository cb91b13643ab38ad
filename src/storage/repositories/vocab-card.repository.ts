/**
 * VocabCard Repository Implementation
 *
 * Data access for VocabCard entities. Handles the mapping between the flat
 * vocab_cards columns and the domain model, whose schedule is a tagged union
 * over the learning and reviewing phases.
 *
 * Rows are validated on the way out: a row whose columns cannot form a valid
 * schedule (e.g. learning_step 7, or an unknown phase) raises
 * InconsistentStateError from single-card lookups. List queries skip such
 * rows with a warning.
 */

import { asc, count, eq, lte, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { vocabCards, type NewVocabCardRow, type VocabCardRow } from '../schema';
import type { CardSchedule, LearningStep, VocabCard } from '@/core/models';
import { InconsistentStateError } from '@/core/scheduler';
import type { Repository } from './base';

/**
 * Input type for creating a new VocabCard.
 */
export interface CreateVocabCardInput {
  /** Unique identifier (e.g., 'vc_<uuid>') */
  id: string;
  word: string;
  partOfSpeech: string;
  meaning: string;
  translation: string;
  /** Initial schedule, normally learning step 1 */
  schedule: CardSchedule;
}

/**
 * Input type for updating a card's content.
 * Schedule changes go through updateSchedule instead.
 */
export interface UpdateVocabCardInput {
  partOfSpeech?: string;
  meaning?: string;
  translation?: string;
}

/**
 * Aggregate counts over the whole store.
 */
export interface VocabCardStats {
  total: number;
  /** Cards due at the reference time */
  pending: number;
  learning: number;
  graduated: number;
  /** Mean easiness factor of graduated cards, 0 when none */
  averageEasinessFactor: number;
}

function toLearningStep(value: number): LearningStep {
  if (value === 1 || value === 2 || value === 3) {
    return value;
  }
  throw new InconsistentStateError('learning_step', value, 'is not a learning step (1-3)');
}

/**
 * Reads the schedule columns of a row.
 *
 * @throws {InconsistentStateError} If the columns cannot form a schedule
 */
function mapSchedule(row: VocabCardRow): CardSchedule {
  // SQLite does not enforce the column's enum, so it is checked here
  const phase: string = row.phase;

  if (phase === 'learning') {
    return {
      phase: 'learning',
      step: toLearningStep(row.learningStep),
      easinessFactor: row.easinessFactor,
      nextDue: row.nextDue,
    };
  }

  if (phase === 'reviewing') {
    return {
      phase: 'reviewing',
      repetitions: row.repetitions,
      intervalDays: row.intervalDays,
      easinessFactor: row.easinessFactor,
      nextDue: row.nextDue,
    };
  }

  throw new InconsistentStateError('phase', phase, "is not 'learning' or 'reviewing'");
}

/**
 * Maps a database row to a VocabCard domain model.
 *
 * @throws {InconsistentStateError} If the schedule columns are invalid
 */
function mapToDomain(row: VocabCardRow): VocabCard {
  return {
    id: row.id,
    word: row.word,
    partOfSpeech: row.partOfSpeech,
    meaning: row.meaning,
    translation: row.translation,
    schedule: mapSchedule(row),
    // Drizzle's timestamp_ms mode already returns Date objects
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Maps the rows of a list query. A row with an inconsistent schedule is
 * logged and left out; the other cards are still returned.
 */
function mapListedRows(rows: VocabCardRow[]): VocabCard[] {
  const cards: VocabCard[] = [];
  for (const row of rows) {
    try {
      cards.push(mapToDomain(row));
    } catch (error) {
      if (!(error instanceof InconsistentStateError)) throw error;
      console.warn(`[storage] Skipping card '${row.word}' (${row.id}): ${error.message}`);
    }
  }
  return cards;
}

/**
 * Flattens a schedule into its columns. Every schedule column is written,
 * so a learning schedule resets repetitions and interval to their
 * post-lapse values and a reviewing schedule clears the learning step.
 */
function scheduleToColumns(
  schedule: CardSchedule
): Pick<
  NewVocabCardRow,
  'phase' | 'learningStep' | 'repetitions' | 'intervalDays' | 'easinessFactor' | 'nextDue'
> {
  if (schedule.phase === 'learning') {
    return {
      phase: 'learning',
      learningStep: schedule.step,
      repetitions: 0,
      intervalDays: 1,
      easinessFactor: schedule.easinessFactor,
      nextDue: schedule.nextDue,
    };
  }

  return {
    phase: 'reviewing',
    learningStep: 0,
    repetitions: schedule.repetitions,
    intervalDays: schedule.intervalDays,
    easinessFactor: schedule.easinessFactor,
    nextDue: schedule.nextDue,
  };
}

/**
 * Repository for VocabCard data access operations.
 *
 * @example
 * ```typescript
 * const repo = new VocabCardRepository(db);
 *
 * // Cards due right now, earliest first
 * const due = await repo.findDue(new Date());
 *
 * // Persist the schedule the scheduler produced
 * await repo.updateSchedule(card.id, result.schedule);
 * ```
 */
export class VocabCardRepository
  implements Repository<VocabCard, CreateVocabCardInput, UpdateVocabCardInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<VocabCard | null> {
    const result = await this.db
      .select()
      .from(vocabCards)
      .where(eq(vocabCards.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Finds a card by its word, ignoring case and surrounding whitespace.
   */
  async findByWord(word: string): Promise<VocabCard | null> {
    const result = await this.db
      .select()
      .from(vocabCards)
      .where(eq(sql`lower(${vocabCards.word})`, word.trim().toLowerCase()))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves every card, ordered alphabetically by word. Cards with an
   * inconsistent schedule are logged and left out.
   */
  async findAll(): Promise<VocabCard[]> {
    const results = await this.db
      .select()
      .from(vocabCards)
      .orderBy(asc(vocabCards.word));

    return mapListedRows(results);
  }

  /**
   * Finds cards whose next_due is at or before the reference time.
   *
   * @param asOf - Reference time for due calculation (defaults to now)
   * @returns Due cards, earliest due first, without cards whose schedule
   *   is inconsistent
   */
  async findDue(asOf: Date = new Date()): Promise<VocabCard[]> {
    const results = await this.db
      .select()
      .from(vocabCards)
      .where(lte(vocabCards.nextDue, asOf))
      .orderBy(asc(vocabCards.nextDue), asc(vocabCards.word));

    return mapListedRows(results);
  }

  async create(input: CreateVocabCardInput): Promise<VocabCard> {
    const now = new Date();

    const result = await this.db
      .insert(vocabCards)
      .values({
        id: input.id,
        word: input.word,
        partOfSpeech: input.partOfSpeech,
        meaning: input.meaning,
        translation: input.translation,
        ...scheduleToColumns(input.schedule),
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return mapToDomain(result[0]);
  }

  /**
   * Updates a card's content fields.
   *
   * @throws Error if the card with the given id does not exist
   */
  async update(id: string, input: UpdateVocabCardInput): Promise<VocabCard> {
    const result = await this.db
      .update(vocabCards)
      .set({
        ...input,
        updatedAt: new Date(),
      })
      .where(eq(vocabCards.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`VocabCard with id '${id}' not found`);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Writes a whole schedule in one UPDATE statement.
   *
   * @returns The card as stored after the update
   * @throws Error if the card with the given id does not exist
   */
  async updateSchedule(id: string, schedule: CardSchedule): Promise<VocabCard> {
    const result = await this.db
      .update(vocabCards)
      .set({
        ...scheduleToColumns(schedule),
        updatedAt: new Date(),
      })
      .where(eq(vocabCards.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`VocabCard with id '${id}' not found`);
    }

    return mapToDomain(result[0]);
  }

  /**
   * @throws Error if the card does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(vocabCards)
      .where(eq(vocabCards.id, id))
      .returning({ id: vocabCards.id });

    if (result.length === 0) {
      throw new Error(`VocabCard with id '${id}' not found`);
    }
  }

  /**
   * Removes every card.
   *
   * @returns Number of cards deleted
   */
  async deleteAll(): Promise<number> {
    const result = await this.db
      .delete(vocabCards)
      .returning({ id: vocabCards.id });

    return result.length;
  }

  /**
   * Computes store-wide counts.
   *
   * @param asOf - Reference time for the pending count
   */
  async getStats(asOf: Date = new Date()): Promise<VocabCardStats> {
    const dueBefore = asOf.getTime();

    const result = await this.db
      .select({
        total: count(),
        pending: sql<number>`coalesce(sum(case when ${vocabCards.nextDue} <= ${dueBefore} then 1 else 0 end), 0)`,
        learning: sql<number>`coalesce(sum(case when ${vocabCards.phase} = 'learning' then 1 else 0 end), 0)`,
        graduated: sql<number>`coalesce(sum(case when ${vocabCards.phase} = 'reviewing' then 1 else 0 end), 0)`,
        averageEasinessFactor: sql<number>`coalesce(avg(case when ${vocabCards.phase} = 'reviewing' then ${vocabCards.easinessFactor} end), 0)`,
      })
      .from(vocabCards);

    const row = result[0];

    return {
      total: row.total,
      pending: row.pending,
      learning: row.learning,
      graduated: row.graduated,
      averageEasinessFactor: row.averageEasinessFactor,
    };
  }
}
