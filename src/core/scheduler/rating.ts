/**
 * Rating Mapper
 *
 * Translates the three user ratings into what the two scheduling phases
 * consume. In the learning phase a rating is structural (regress, repeat,
 * advance); once graduated it becomes an SM-2 quality value.
 */

import type { SchedulePhase } from '../models';
import { InvalidRatingError } from './errors';
import type {
  LearningAction,
  Rating,
  RatingInterpretation,
  Sm2Quality,
} from './types';

/**
 * Raw tokens accepted from a prompt or request body. The digits follow the
 * on-screen legend "(1) Forgot (2) Hard (3) Easy".
 */
const TOKEN_MAP: Record<string, Rating> = {
  '1': 'forgot',
  '2': 'hard',
  '3': 'easy',
  forgot: 'forgot',
  hard: 'hard',
  easy: 'easy',
};

/**
 * Parses a raw rating token.
 *
 * @param token - User input such as '2' or 'Easy'
 * @returns The corresponding Rating
 * @throws InvalidRatingError if the token is not recognized
 */
export function parseRating(token: string): Rating {
  const normalized = token.trim().toLowerCase();
  const rating = Object.hasOwn(TOKEN_MAP, normalized) ? TOKEN_MAP[normalized] : undefined;
  if (rating === undefined) {
    throw new InvalidRatingError(token);
  }
  return rating;
}

/**
 * Maps a rating to the learning-step action it triggers.
 */
export function toLearningAction(rating: Rating): LearningAction {
  const actionMap: Record<Rating, LearningAction> = {
    forgot: 'regress',
    hard: 'repeat',
    easy: 'advance',
  };
  return actionMap[rating];
}

/**
 * Maps a rating to its SM-2 quality value.
 */
export function toQuality(rating: Rating): Sm2Quality {
  const qualityMap: Record<Rating, Sm2Quality> = {
    forgot: 0,
    hard: 3,
    easy: 5,
  };
  return qualityMap[rating];
}

/**
 * Interprets a rating for a card in the given phase.
 */
export function interpretRating(rating: Rating, phase: SchedulePhase): RatingInterpretation {
  if (phase === 'learning') {
    return { phase, action: toLearningAction(rating) };
  }
  return { phase, quality: toQuality(rating) };
}
