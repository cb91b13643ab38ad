/**
 * Review Module - Barrel Export
 */

export { ReviewService, type AddWordInput, type RatingOutcome } from './review-service';

export {
  runReviewSession,
  isQuitToken,
  QUIT_TOKENS,
  type ReviewPrompter,
  type CardPromptReply,
  type ReviewSessionOptions,
  type ReviewSessionSummary,
} from './review-session';
