/**
 * Tests for the dictionary lookup client, run against a fake fetch.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { DictionaryClient } from '../../src/core/dictionary';
import { createFakeFetch, jsonResponse } from '../helpers';

const API_URL = 'https://dictionary.test/entries/en';
const TRANSLATION_URL = 'https://translate.test/get';

const RUN_ENTRIES = [
  {
    word: 'run',
    meanings: [
      {
        partOfSpeech: 'verb',
        definitions: [
          { definition: 'To move swiftly on foot.', example: 'She runs every morning.' },
          { definition: 'To operate a machine.' },
        ],
      },
      {
        partOfSpeech: 'noun',
        definitions: [{ definition: 'An act of running.' }],
      },
    ],
  },
  {
    word: 'run',
    meanings: [
      {
        partOfSpeech: 'verb',
        definitions: [{ definition: 'To move swiftly on foot.' }, { definition: 'To flow.' }],
      },
    ],
  },
];

function translationBody(text: string, status: number | string = 200): unknown {
  return { responseStatus: status, responseData: { translatedText: text } };
}

describe('DictionaryClient', () => {
  let warnSpy: MockInstance;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createClient(route: (url: URL) => Response | Promise<Response>) {
    const fake = createFakeFetch(route);
    const client = new DictionaryClient({
      apiUrl: API_URL,
      translationUrl: TRANSLATION_URL,
      fetch: fake.fetch,
    });
    return { client, calls: fake.calls };
  }

  describe('lookupAllMeanings', () => {
    it('returns every distinct definition in order', async () => {
      const { client, calls } = createClient(() => jsonResponse(RUN_ENTRIES));

      const meanings = await client.lookupAllMeanings('run');

      expect(meanings).toEqual([
        { partOfSpeech: 'verb', definition: 'To move swiftly on foot.', example: 'She runs every morning.' },
        { partOfSpeech: 'verb', definition: 'To operate a machine.', example: '' },
        { partOfSpeech: 'noun', definition: 'An act of running.', example: '' },
        { partOfSpeech: 'verb', definition: 'To flow.', example: '' },
      ]);
      expect(calls.map((url) => url.toString())).toEqual([`${API_URL}/run`]);
    });

    it('encodes the trimmed word into the path', async () => {
      const { client, calls } = createClient(() => jsonResponse([]));

      await client.lookupAllMeanings('  ice cream ');

      expect(calls[0].pathname).toBe('/entries/en/ice%20cream');
    });

    it('does not call the API for a blank word', async () => {
      const { client, calls } = createClient(() => jsonResponse(RUN_ENTRIES));

      expect(await client.lookupAllMeanings('   ')).toEqual([]);
      expect(calls).toHaveLength(0);
    });

    it('treats 404 as an unknown word without warning', async () => {
      const { client } = createClient(() => jsonResponse({ title: 'No Definitions Found' }, 404));

      expect(await client.lookupAllMeanings('qwxz')).toEqual([]);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('warns and returns nothing on a server error', async () => {
      const { client } = createClient(() => jsonResponse({}, 500));

      expect(await client.lookupAllMeanings('run')).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith('[dictionary] dictionary request failed with HTTP 500');
    });

    it('warns and returns nothing when fetch throws', async () => {
      const { client } = createClient(() => {
        throw new Error('network down');
      });

      expect(await client.lookupAllMeanings('run')).toEqual([]);
      expect(warnSpy).toHaveBeenCalledWith('[dictionary] dictionary request failed:', 'network down');
    });

    it('returns nothing for a payload of the wrong shape', async () => {
      const { client } = createClient(() => jsonResponse({ meanings: 'not a list' }));

      expect(await client.lookupAllMeanings('run')).toEqual([]);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('lookupWord', () => {
    it('joins the parts of speech and translates the first definition', async () => {
      const { client, calls } = createClient((url) =>
        url.origin === 'https://translate.test'
          ? jsonResponse(translationBody('用腳快速移動。'))
          : jsonResponse(RUN_ENTRIES)
      );

      const lookup = await client.lookupWord('run');

      expect(lookup).toEqual({
        partOfSpeech: 'verb/noun',
        definition: 'To move swiftly on foot.',
        translation: '用腳快速移動。',
      });
      expect(calls[1].searchParams.get('q')).toBe('To move swiftly on foot.');
      expect(calls[1].searchParams.get('langpair')).toBe('en|zh-TW');
    });

    it('keeps the definition when translation fails', async () => {
      const { client } = createClient((url) =>
        url.origin === 'https://translate.test' ? jsonResponse({}, 503) : jsonResponse(RUN_ENTRIES)
      );

      const lookup = await client.lookupWord('run');

      expect(lookup).toEqual({
        partOfSpeech: 'verb/noun',
        definition: 'To move swiftly on foot.',
        translation: '',
      });
    });

    it('returns null for an unknown word', async () => {
      const { client } = createClient(() => jsonResponse({}, 404));

      expect(await client.lookupWord('qwxz')).toBeNull();
    });

    it('returns null for an entry without meanings', async () => {
      const { client } = createClient(() => jsonResponse([{ word: 'odd', meanings: [] }]));

      expect(await client.lookupWord('odd')).toBeNull();
    });
  });

  describe('translate', () => {
    it('returns the translated text', async () => {
      const { client } = createClient(() => jsonResponse(translationBody('你好')));

      expect(await client.translate('hello')).toBe('你好');
    });

    it('accepts a string response status', async () => {
      const { client } = createClient(() => jsonResponse(translationBody('你好', '200')));

      expect(await client.translate('hello')).toBe('你好');
    });

    it('returns null for blank text without a request', async () => {
      const { client, calls } = createClient(() => jsonResponse(translationBody('x')));

      expect(await client.translate('  ')).toBeNull();
      expect(calls).toHaveLength(0);
    });

    it('returns null for a non-200 response status', async () => {
      const { client } = createClient(() => jsonResponse(translationBody('x', 403)));

      expect(await client.translate('hello')).toBeNull();
    });

    it('returns null for a quota warning', async () => {
      const { client } = createClient(() =>
        jsonResponse(translationBody('MYMEMORY WARNING: YOU USED ALL AVAILABLE FREE TRANSLATIONS'))
      );

      expect(await client.translate('hello')).toBeNull();
    });

    it('returns null for empty translated text', async () => {
      const { client } = createClient(() => jsonResponse({ responseStatus: 200, responseData: null }));

      expect(await client.translate('hello')).toBeNull();
    });
  });
});
