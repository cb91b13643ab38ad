/**
 * CLI Command Tests
 *
 * Runs each command through the commander program built by createProgram,
 * over an in-memory database, a fixed clock and a scripted prompter.
 * Console output is captured and compared line by line with ANSI codes
 * stripped.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createProgram } from '../../src/cli/program';
import type { CliContext } from '../../src/cli/context';
import { DictionaryClient } from '../../src/core/dictionary';
import { MINUTE_MS } from '../../src/core/scheduler';
import { cleanupTestDatabase, createTestContext, type TestContext, type TestContextOptions } from '../setup';
import {
  captureConsole,
  createFakeFetch,
  createTestCard,
  jsonResponse,
  ScriptedPrompter,
  type ConsoleCapture,
} from '../helpers';

interface CliHarness {
  context: CliContext;
  prompter: ScriptedPrompter;
  sleeps: number[];
}

describe('CLI commands', () => {
  let ctx: TestContext;
  let output: ConsoleCapture;

  function createHarness(
    options: { testMode?: boolean; answers?: string[]; dictionary?: DictionaryClient | null } = {}
  ): CliHarness {
    const prompter = new ScriptedPrompter(options.answers ?? []);
    const sleeps: number[] = [];
    const context: CliContext = {
      service: ctx.service,
      dictionary: options.dictionary ?? null,
      clock: ctx.clock,
      testMode: options.testMode ?? false,
      createPrompter: () => prompter,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    };
    return { context, prompter, sleeps };
  }

  async function run(harness: CliHarness, ...args: string[]): Promise<void> {
    await createProgram(harness.context).exitOverride().parseAsync(['node', 'vocab-drill', ...args]);
  }

  // Command output only; the service's own [review] log lines are dropped
  function printed(): string[] {
    return output.lines().filter((line) => !line.startsWith('[review]'));
  }

  function setUp(options: TestContextOptions = {}): void {
    ctx = createTestContext(options);
  }

  beforeEach(() => {
    output = captureConsole();
  });

  afterEach(() => {
    output.restore();
    cleanupTestDatabase(ctx);
  });

  // ==========================================================================
  // add
  // ==========================================================================
  describe('add', () => {
    it('adds a word with an explicit meaning', async () => {
      setUp();
      const harness = createHarness();

      await run(harness, 'add', 'diligent', '--meaning', 'Showing care.', '--pos', 'adjective');

      expect(printed()).toEqual(["Added: 'diligent' (adjective) - first review in 1min", '  Showing care.']);
      const card = await ctx.service.findByWord('diligent');
      expect(card.schedule).toMatchObject({ phase: 'learning', step: 1 });
    });

    it('shows the accelerated due time in test mode', async () => {
      setUp({ accelerationFactor: 1000 });
      const harness = createHarness({ testMode: true });

      await run(harness, 'add', 'swift', '-m', 'Fast.');

      expect(printed()).toEqual([
        "Added: 'swift' - first review in 1min",
        '  Fast.',
        '  (test mode: due in 0.1s)',
      ]);
    });

    it('fills in the meaning from the dictionary', async () => {
      setUp();
      const { fetch } = createFakeFetch((url) =>
        url.hostname === 'translate.test'
          ? jsonResponse({ responseStatus: 200, responseData: { translatedText: '跑' } })
          : jsonResponse([
              { word: 'run', meanings: [{ partOfSpeech: 'verb', definitions: [{ definition: 'To move fast.' }] }] },
            ])
      );
      const dictionary = new DictionaryClient({
        apiUrl: 'https://dictionary.test/entries/en',
        translationUrl: 'https://translate.test/get',
        fetch,
      });
      const harness = createHarness({ dictionary });

      await run(harness, 'add', 'run');

      expect(printed()).toEqual([
        '  Looking up definition...',
        "Added: 'run' (verb) - first review in 1min",
        '  To move fast.',
        '  跑',
      ]);
    });

    it('requires a meaning when lookup is off', async () => {
      setUp();
      const harness = createHarness();

      await expect(run(harness, 'add', 'obscure', '--no-lookup')).rejects.toThrow(
        "No definition for 'obscure'. Pass one with --meaning."
      );
      expect(await ctx.service.listAll()).toEqual([]);
    });

    it('rejects a duplicate word', async () => {
      setUp();
      await createTestCard(ctx.service, { word: 'echo' });
      const harness = createHarness();

      await expect(run(harness, 'add', 'Echo', '-m', 'Again.')).rejects.toThrow(
        "Word 'Echo' is already in the list"
      );
    });
  });

  // ==========================================================================
  // pending / list / stats
  // ==========================================================================
  describe('pending', () => {
    it('reports when nothing is due', async () => {
      setUp();
      await createTestCard(ctx.service);

      await run(createHarness(), 'pending');

      expect(printed()).toEqual(['No words pending for review. Great job!']);
    });

    it('lists due words with their phase', async () => {
      setUp();
      await createTestCard(ctx.service, { word: 'ample' });
      ctx.clock.advance(MINUTE_MS);

      await run(createHarness(), 'pending');

      expect(printed()).toEqual(['Pending Reviews: 1 word(s)', '  - ample [learning (step 1/3)]']);
    });
  });

  describe('list', () => {
    it('reports an empty store', async () => {
      setUp();

      await run(createHarness(), 'list');

      expect(printed()).toEqual(["No words yet. Use 'add' to add some!"]);
    });

    it('prints each card with its schedule', async () => {
      setUp();
      await createTestCard(ctx.service, {
        word: 'brisk',
        meaning: 'Quick and active.',
        partOfSpeech: 'adjective',
        translation: '輕快的',
      });

      await run(createHarness(), 'ls');

      expect(printed()).toEqual([
        'All Words (1)',
        '  brisk (adjective): Quick and active.',
        '    輕快的',
        '    [Learning step 1/3] next: 1min',
      ]);
    });
  });

  describe('stats', () => {
    it('prints the counts', async () => {
      setUp();
      await createTestCard(ctx.service);
      await createTestCard(ctx.service);

      await run(createHarness(), 'stats');

      expect(printed()).toEqual([
        'Statistics',
        '─'.repeat(30),
        '  Total words: 2',
        '  In learning: 2',
        '  Graduated (SM-2): 0',
        '  Pending now: 0',
      ]);
    });
  });

  // ==========================================================================
  // delete / clear
  // ==========================================================================
  describe('delete', () => {
    it('deletes a word by name', async () => {
      setUp();
      await createTestCard(ctx.service, { word: 'gone' });

      await run(createHarness(), 'rm', 'GONE');

      expect(printed()).toEqual(["Deleted: 'gone'"]);
      expect(await ctx.service.listAll()).toEqual([]);
    });

    it('fails for an unknown word', async () => {
      setUp();

      await expect(run(createHarness(), 'delete', 'ghost')).rejects.toThrow("Card 'ghost' not found");
    });
  });

  describe('clear', () => {
    it('deletes everything with --yes', async () => {
      setUp();
      await createTestCard(ctx.service);
      await createTestCard(ctx.service);

      await run(createHarness(), 'clear', '--yes');

      expect(printed()).toEqual(['Deleted 2 word(s).']);
    });

    it('keeps the words when the confirmation is declined', async () => {
      setUp();
      await createTestCard(ctx.service);
      const harness = createHarness({ answers: ['n'] });

      await run(harness, 'clear');

      expect(printed()).toEqual(['Nothing deleted.']);
      expect(await ctx.service.listAll()).toHaveLength(1);
      expect(harness.prompter.closed).toBe(true);
    });

    it('deletes after confirmation', async () => {
      setUp();
      await createTestCard(ctx.service);
      const harness = createHarness({ answers: ['y'] });

      await run(harness, 'clear');

      expect(printed()).toEqual(['Deleted 1 word(s).']);
    });
  });

  // ==========================================================================
  // wait
  // ==========================================================================
  describe('wait', () => {
    it('is refused outside test mode', async () => {
      setUp();
      const harness = createHarness();

      await expect(run(harness, 'wait', '2')).rejects.toThrow(
        'The wait command is only available in test mode (--test).'
      );
      expect(harness.sleeps).toEqual([]);
    });

    it('sleeps for the given seconds in test mode', async () => {
      setUp({ accelerationFactor: 1000 });
      const harness = createHarness({ testMode: true });

      await run(harness, 'wait', '2');

      expect(harness.sleeps).toEqual([2000]);
      expect(printed()).toEqual(['Waiting 2s...', 'done.']);
    });

    it('defaults to one second', async () => {
      setUp({ accelerationFactor: 1000 });
      const harness = createHarness({ testMode: true });

      await run(harness, 'wait');

      expect(harness.sleeps).toEqual([1000]);
    });

    it('rejects a non-numeric duration', async () => {
      setUp({ accelerationFactor: 1000 });
      const harness = createHarness({ testMode: true });

      await expect(run(harness, 'wait', 'soon')).rejects.toThrow("Invalid number of seconds: 'soon'");
    });
  });

  // ==========================================================================
  // review
  // ==========================================================================
  describe('review', () => {
    it('reports when nothing is due', async () => {
      setUp();

      await run(createHarness(), 'review');

      expect(printed()).toEqual(['No words pending for review. Great job!']);
    });

    it('runs a session over the due words', async () => {
      setUp();
      await createTestCard(ctx.service, { word: 'lucid' });
      ctx.clock.advance(MINUTE_MS);
      const harness = createHarness({ answers: ['', '3'] });

      await run(harness, 'review');

      expect(harness.prompter.presented).toEqual(['lucid']);
      expect(harness.prompter.feedback).toEqual(['Step 2/3 - review in 10min']);
      expect(harness.prompter.closed).toBe(true);
      expect(printed()).toContain('  Review Session: 1 word(s)');
      expect(printed()).toContain('  Session Complete!');
      expect(printed()).toContain('  Reviewed 1 word(s).');
    });

    it('ends early when the learner quits', async () => {
      setUp();
      await createTestCard(ctx.service);
      ctx.clock.advance(MINUTE_MS);
      const harness = createHarness({ answers: ['q'] });

      await run(harness, 'review');

      expect(printed()).toContain('Session ended. Reviewed 0 word(s).');
      expect(harness.prompter.closed).toBe(true);
    });
  });
});
