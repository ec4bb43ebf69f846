#!/usr/bin/env node

/**
 * CLI interface for yomikata
 */

import { Command } from 'commander';
import {
  alignReading,
  closeConnection,
  createContext,
  createKuromojiAnalyzer,
  findWordTokens,
  highlightText,
  JsonKanjiSource,
  PostgresKanjiSource,
  setDebug,
  type FuriganaMode,
  type HighlightContext,
  type WordAlignment,
  wordHighlight
} from '@yomikata/core';
import { config } from 'dotenv';

const MODES: readonly FuriganaMode[] = ['furigana', 'furikanji', 'kana_only'];

export interface CliOptions {
  kanji?: string;
  mode?: string;
  tags?: boolean;
  merge?: boolean;
  katakana?: boolean;
  includeSuruOkuri?: boolean;
  /** Detect okurigana with kuromoji */
  analyzer?: boolean;
  /** Read kanji readings from PostgreSQL instead of the bundled JSON */
  db?: boolean;
  /** Print alignments as JSON instead of rendered text */
  json?: boolean;
  /** Bold this dictionary-form word and its inflections instead of aligning */
  word?: string;
  /** Overrides the context built from the flags above */
  context?: HighlightContext;
}

export function parseMode(mode: string | undefined): FuriganaMode {
  if (mode === undefined) return 'furigana';
  const found = MODES.find((candidate) => candidate === mode);
  if (!found) {
    throw new Error(`Unknown mode: ${mode} (expected ${MODES.join(', ')})`);
  }
  return found;
}

export async function buildContext(options: Pick<CliOptions, 'analyzer' | 'db'>): Promise<HighlightContext> {
  return createContext({
    source: options.db ? new PostgresKanjiSource() : new JsonKanjiSource(),
    analyzer: options.analyzer ? await createKuromojiAnalyzer() : null
  });
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export async function runCli(input: string, options: CliOptions = {}): Promise<string> {
  const returnType = parseMode(options.mode);
  const context = options.context ?? await buildContext(options);

  if (options.word) {
    return (await wordHighlight(input, options.word, context)).trim();
  }

  if (options.json) {
    const alignments: Array<WordAlignment & { input: string }> = [];
    for (const token of findWordTokens(input)) {
      const aligned = await alignReading(token.word, token.reading, token.trailingKana, context);
      alignments.push({ input: `${token.word}[${token.reading}]${token.trailingKana}`, ...aligned });
    }
    return JSON.stringify(alignments, null, 2);
  }

  const output = await highlightText(
    input,
    {
      kanjiToHighlight: options.kanji ?? null,
      returnType,
      withTags: options.tags ?? true,
      mergeConsecutive: options.merge ?? true,
      onyomiToKatakana: options.katakana ?? true,
      includeSuruOkuri: options.includeSuruOkuri ?? false
    },
    context
  );
  return output.trim();
}

export function createProgram(): Command {
  return new Command()
    .name('yomikata')
    .description('Align furigana readings to kanji and highlight one kanji\'s reading')
    .usage('[options] <text...>')
    .version('0.1.0')
    .argument('<text...>', 'text with furigana, e.g. "漢字[かんじ]を 書[か]く"')
    .option('-k, --kanji <char>', 'kanji whose reading is highlighted')
    .option('-m, --mode <mode>', `output mode (${MODES.join(', ')})`, 'furigana')
    .option('--no-tags', 'omit <on>/<kun>/<juk> reading tags')
    .option('--no-merge', 'keep one furigana block per kanji')
    .option('--no-katakana', 'write onyomi in hiragana')
    .option('--include-suru-okuri', 'keep する okurigana inside the highlight')
    .option('-a, --analyzer', 'detect okurigana with kuromoji')
    .option('--db', 'read kanji readings from the database')
    .option('-j, --json', 'print word alignments as JSON')
    .option('-w, --word <word>', 'bold a dictionary-form word and its inflections, e.g. "食[た]べる"')
    .option('-d, --debug', 'print debug output')
    .helpOption('-h, --help', 'print this help text');
}

async function main(): Promise<void> {
  config();
  const program = createProgram();
  program.parse(process.argv);
  const options = program.opts<CliOptions & { debug?: boolean }>();

  if (options.debug) setDebug(true);

  try {
    const output = await runCli(program.args.join(' '), options);
    process.stdout.write(output);
    process.stdout.write('\n');
  } finally {
    // Close database connection to allow process to exit
    await closeConnection();
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
