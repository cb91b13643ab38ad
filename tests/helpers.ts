/**
 * Test Helper Functions
 *
 * Shared fixtures and assertions: card factories, API envelope parsing,
 * console capture for CLI output, a scripted review prompter and a fake
 * fetch for the dictionary client.
 */

import { vi, type MockInstance } from 'vitest';
import { z } from 'zod';
import type { InteractivePrompter } from '../src/cli/utils/prompter';
import type { VocabCard } from '../src/core/models';
import type { CardPromptReply, RatingOutcome, ReviewService } from '../src/core/review';
import type { InvalidRatingError } from '../src/core/scheduler';

// ============================================================================
// Card Factories
// ============================================================================

export interface CreateCardOptions {
  word?: string;
  meaning?: string;
  partOfSpeech?: string;
  translation?: string;
}

let wordCounter = 0;

/**
 * Adds a card through the service, with a unique word unless one is given.
 */
export async function createTestCard(
  service: ReviewService,
  options: CreateCardOptions = {}
): Promise<VocabCard> {
  wordCounter++;
  return service.addWord({
    word: options.word ?? `word${wordCounter}`,
    meaning: options.meaning ?? `Meaning of word ${wordCounter}`,
    partOfSpeech: options.partOfSpeech,
    translation: options.translation,
  });
}

// ============================================================================
// API Envelope Parsing
// ============================================================================

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Parses a response body as the standard API envelope.
 */
export async function readEnvelope(response: Response): Promise<Envelope> {
  return envelopeSchema.parse(await response.json());
}

/**
 * Extracts the `id` of an object in an envelope's data.
 */
export function dataId(envelope: Envelope): string {
  return z.object({ id: z.string() }).parse(envelope.data).id;
}

/**
 * Sends a JSON body to the app.
 */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

// ============================================================================
// Console Capture
// ============================================================================

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export interface ConsoleCapture {
  /** Everything logged so far, one entry per call, ANSI codes removed */
  lines(): string[];
  restore(): void;
}

/**
 * Captures console.log output (and silences console.warn/error).
 */
export function captureConsole(): ConsoleCapture {
  const lines: string[] = [];
  const spies: MockInstance[] = [
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(stripAnsi(args.map(String).join(' ')));
    }),
    vi.spyOn(console, 'warn').mockImplementation(() => {}),
    vi.spyOn(console, 'error').mockImplementation(() => {}),
  ];

  return {
    lines: () => [...lines],
    restore: () => {
      for (const spy of spies) spy.mockRestore();
    },
  };
}

// ============================================================================
// Scripted Prompter
// ============================================================================

/**
 * Review prompter answering from a script. Every prompt (reveal, rating,
 * confirmation) consumes the next answer; an empty script answers 'q'.
 */
export class ScriptedPrompter implements InteractivePrompter {
  readonly presented: string[] = [];
  readonly revealed: string[] = [];
  readonly feedback: string[] = [];
  readonly invalidTokens: string[] = [];
  closed = false;

  private readonly controller = new AbortController();
  private readonly answers: string[];

  /**
   * @param answers - Answers in prompt order
   * @param onPrompt - Called before each answer is returned, e.g. to abort
   */
  constructor(answers: string[], private readonly onPrompt?: (prompter: ScriptedPrompter) => void) {
    this.answers = [...answers];
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(): void {
    this.controller.abort();
  }

  async presentCard(card: VocabCard): Promise<CardPromptReply> {
    this.presented.push(card.word);
    const answer = this.next();
    return answer === 'q' ? 'quit' : 'reveal';
  }

  revealAnswer(card: VocabCard): void {
    this.revealed.push(card.word);
  }

  async askRating(): Promise<string> {
    return this.next();
  }

  showFeedback(outcome: RatingOutcome): void {
    this.feedback.push(outcome.feedback);
  }

  showInvalidRating(error: InvalidRatingError): void {
    this.invalidTokens.push(error.token);
  }

  async confirm(): Promise<boolean> {
    return this.next() === 'y';
  }

  close(): void {
    this.closed = true;
  }

  private next(): string {
    this.onPrompt?.(this);
    return this.answers.shift() ?? 'q';
  }
}

// ============================================================================
// Fake Fetch
// ============================================================================

export type FakeRoute = (url: URL) => Response | Promise<Response>;

/**
 * A fetch stand-in that routes on the request URL and records every call.
 */
export function createFakeFetch(route: FakeRoute): {
  fetch: typeof fetch;
  calls: URL[];
} {
  const calls: URL[] = [];
  const fakeFetch: typeof fetch = async (input) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    calls.push(url);
    return route(url);
  };
  return { fetch: fakeFetch, calls };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
