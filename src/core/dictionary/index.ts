/**
 * Dictionary Module - Barrel Export
 */

export {
  DictionaryClient,
  type DictionaryClientConfig,
  type FetchFunction,
  type WordLookup,
  type WordMeaning,
} from './client';
