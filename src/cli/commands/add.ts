/**
 * CLI Add Command
 *
 * Adds a word at learning step 1. Without --meaning the definition, part of
 * speech and translation are looked up; explicit options always win over
 * the lookup.
 *
 * Usage:
 * ```bash
 * vocab-drill add diligent
 * vocab-drill add diligent --meaning "Hard-working" --pos adjective --no-lookup
 * ```
 */

import { Command } from 'commander';
import { ValidationError } from '@/core/errors';
import { formatNominalDuration, formatTimeUntil, stepDuration } from '@/core/scheduler';
import type { CliContext } from '../context';
import { dim, green, yellow } from '../utils/terminal';

interface AddOptions {
  meaning?: string;
  pos?: string;
  translation?: string;
  lookup: boolean;
}

export function createAddCommand(context: CliContext): Command {
  return new Command('add')
    .description('Add a new word (first review in 1 minute)')
    .argument('<word>', 'The word to learn')
    .option('-m, --meaning <text>', 'Definition (looked up when omitted)')
    .option('-p, --pos <pos>', 'Part of speech, e.g. noun, verb, adjective')
    .option('-t, --translation <text>', 'Translation of the definition')
    .option('--no-lookup', 'Do not query the online dictionary')
    .action(async (word: string, options: AddOptions) => {
      await addWord(context, word, options);
    });
}

async function addWord(context: CliContext, word: string, options: AddOptions): Promise<void> {
  let meaning = options.meaning ?? '';
  let partOfSpeech = options.pos ?? '';
  let translation = options.translation ?? '';

  if (meaning.trim() === '' && options.lookup && context.dictionary) {
    console.log(dim('  Looking up definition...'));
    const lookup = await context.dictionary.lookupWord(word);

    if (lookup) {
      meaning = lookup.definition;
      partOfSpeech = partOfSpeech || lookup.partOfSpeech;
      translation = translation || lookup.translation;
    } else {
      console.log(yellow('  (Word not found in dictionary)'));
    }
  }

  if (meaning.trim() === '') {
    throw new ValidationError(`No definition for '${word.trim()}'. Pass one with --meaning.`, {
      field: 'meaning',
    });
  }

  const card = await context.service.addWord({ word, meaning, partOfSpeech, translation });

  const pos = card.partOfSpeech ? ` (${card.partOfSpeech})` : '';
  console.log(
    green(`Added: '${card.word}'${pos} - first review in ${formatNominalDuration(stepDuration(1))}`)
  );
  console.log(`  ${card.meaning}`);
  if (card.translation) {
    console.log(`  ${dim(card.translation)}`);
  }
  if (context.testMode) {
    console.log(dim(`  (test mode: due in ${formatTimeUntil(card.schedule.nextDue, context.clock)})`));
  }
}
