/**
 * Dictionary Lookup Client
 *
 * Fetches definitions from the Free Dictionary API and translations from the
 * MyMemory translation API so `add` can fill in a word's meaning for the
 * learner. Both services are free and keyless.
 *
 * Lookup is a convenience, never a requirement: network errors, non-OK
 * responses and payloads that do not match the expected shape are logged
 * as warnings and reported as "nothing found" (null or an empty list).
 *
 * @example
 * ```typescript
 * const client = new DictionaryClient({ timeoutMs: 5000 });
 * const entry = await client.lookupWord('diligent');
 * // { partOfSpeech: 'adjective', definition: 'Showing care...', translation: '勤奮的' }
 * ```
 */

import { z } from 'zod';

// =============================================================================
// Response Schemas
// =============================================================================

const definitionSchema = z.object({
  definition: z.string().default(''),
  example: z.string().optional(),
});

const meaningSchema = z.object({
  partOfSpeech: z.string().default(''),
  definitions: z.array(definitionSchema).default([]),
});

const entrySchema = z.object({
  word: z.string().optional(),
  meanings: z.array(meaningSchema).default([]),
});

const dictionaryResponseSchema = z.array(entrySchema);

const translationResponseSchema = z.object({
  responseStatus: z.union([z.number(), z.string()]),
  responseData: z
    .object({
      translatedText: z.string().nullable().default(''),
    })
    .nullable()
    .optional(),
});

type DictionaryEntry = z.infer<typeof entrySchema>;

// =============================================================================
// Public Types
// =============================================================================

/**
 * One sense of a word.
 */
export interface WordMeaning {
  partOfSpeech: string;
  definition: string;
  /** Usage example, empty when the dictionary has none */
  example: string;
}

/**
 * Summary used to pre-fill a new card.
 */
export interface WordLookup {
  /** Every part of speech of the first entry, joined by '/' */
  partOfSpeech: string;
  /** First definition of the first meaning */
  definition: string;
  /** Translation of the definition, empty when unavailable */
  translation: string;
}

export type FetchFunction = typeof fetch;

/**
 * Configuration options for the DictionaryClient.
 */
export interface DictionaryClientConfig {
  /** Base URL; the encoded word is appended as a path segment */
  apiUrl: string;
  /** MyMemory endpoint */
  translationUrl: string;
  /** MyMemory language pair */
  languagePair: string;
  /** Per-request timeout */
  timeoutMs: number;
  /** Fetch implementation, replaceable in tests */
  fetch: FetchFunction;
}

const DEFAULT_CONFIG: DictionaryClientConfig = {
  apiUrl: 'https://api.dictionaryapi.dev/api/v2/entries/en',
  translationUrl: 'https://api.mymemory.translated.net/get',
  languagePair: 'en|zh-TW',
  timeoutMs: 10000,
  fetch: (input, init) => fetch(input, init),
};

/** Marker MyMemory puts in the text when a quota is exceeded. */
const MYMEMORY_WARNING = 'MYMEMORY WARNING';

// =============================================================================
// Client
// =============================================================================

export class DictionaryClient {
  private readonly config: DictionaryClientConfig;

  /**
   * @param config - Optional partial configuration to override defaults
   */
  constructor(config?: Partial<DictionaryClientConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Every distinct definition of a word across all dictionary entries.
   * A definition seen once is skipped on later occurrences.
   */
  async lookupAllMeanings(word: string): Promise<WordMeaning[]> {
    const entries = await this.fetchEntries(word);
    if (!entries) return [];

    const meanings: WordMeaning[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      for (const meaning of entry.meanings) {
        for (const definition of meaning.definitions) {
          if (seen.has(definition.definition)) continue;
          seen.add(definition.definition);

          meanings.push({
            partOfSpeech: meaning.partOfSpeech,
            definition: definition.definition,
            example: definition.example ?? '',
          });
        }
      }
    }

    return meanings;
  }

  /**
   * Looks up a word and translates its first definition.
   *
   * @returns null when the word is unknown or the lookup fails
   */
  async lookupWord(word: string): Promise<WordLookup | null> {
    const entries = await this.fetchEntries(word);
    const first = entries?.[0];
    if (!first || first.meanings.length === 0) return null;

    const definition = first.meanings[0].definitions[0]?.definition ?? '';
    const partOfSpeech = first.meanings
      .map((meaning) => meaning.partOfSpeech)
      .filter((pos) => pos.length > 0)
      .join('/');

    const translation = await this.translate(definition);

    return { partOfSpeech, definition, translation: translation ?? '' };
  }

  /**
   * Translates text with MyMemory.
   *
   * @returns The translation, or null for blank input or any failure
   */
  async translate(text: string): Promise<string | null> {
    if (text.trim().length === 0) return null;

    const url = new URL(this.config.translationUrl);
    url.searchParams.set('q', text);
    url.searchParams.set('langpair', this.config.languagePair);

    const body = await this.getJson(url.toString(), 'translation');
    if (body === undefined) return null;

    const parsed = translationResponseSchema.safeParse(body);
    if (!parsed.success) {
      console.warn('[dictionary] Unexpected translation response:', parsed.error.message);
      return null;
    }

    if (Number(parsed.data.responseStatus) !== 200) return null;

    const translated = parsed.data.responseData?.translatedText ?? '';
    if (translated.length === 0 || translated.includes(MYMEMORY_WARNING)) return null;

    return translated;
  }

  private async fetchEntries(word: string): Promise<DictionaryEntry[] | null> {
    const trimmed = word.trim();
    if (trimmed.length === 0) return null;

    const body = await this.getJson(
      `${this.config.apiUrl}/${encodeURIComponent(trimmed)}`,
      'dictionary'
    );
    if (body === undefined) return null;

    const parsed = dictionaryResponseSchema.safeParse(body);
    if (!parsed.success) {
      console.warn(`[dictionary] Unexpected response for '${trimmed}':`, parsed.error.message);
      return null;
    }

    return parsed.data;
  }

  /**
   * GETs a URL and parses the JSON body.
   *
   * @returns The body, or undefined when the request failed
   */
  private async getJson(url: string, label: string): Promise<unknown> {
    try {
      const response = await this.config.fetch(url, {
        signal: AbortSignal.timeout(this.config.timeoutMs),
        headers: { Accept: 'application/json' },
      });

      if (!response.ok) {
        // 404 is the dictionary's answer for unknown words
        if (response.status !== 404) {
          console.warn(`[dictionary] ${label} request failed with HTTP ${response.status}`);
        }
        return undefined;
      }

      const body: unknown = await response.json();
      return body;
    } catch (error) {
      console.warn(
        `[dictionary] ${label} request failed:`,
        error instanceof Error ? error.message : String(error)
      );
      return undefined;
    }
  }
}
