#!/usr/bin/env node
/**
 * CLI for yomikata data preparation
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import fs from 'fs';
import { closeConnection, getConnection, getConnectionFromEnv, DB_URL_ENV, setConnection } from '@yomikata/core';
import { initTables } from './data/schema.js';
import { exportKanjiJson, loadKanjiToDb, readKanjidicFile } from './data/load-kanjidic.js';
import { exportExceptionJson, parseExceptionCsv } from './data/exceptions-csv.js';

export { parseKanjidic, readKanjidicFile, exportKanjiJson, loadKanjiToDb, toKanjiData, type KanjidicEntry } from './data/load-kanjidic.js';
export { parseExceptionCsv, exportExceptionJson } from './data/exceptions-csv.js';
export { initTables } from './data/schema.js';

function connectFromEnv(): void {
  const connSpec = getConnectionFromEnv();
  if (!connSpec) {
    throw new Error(`${DB_URL_ENV} environment variable not set`);
  }
  setConnection(connSpec);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('yomikata-data')
    .description('Kanji reading and exception data preparation')
    .version('0.1.0');

  program
    .command('init-db')
    .description('Initialize database schema (drops and recreates the kanji tables)')
    .action(async () => {
      connectFromEnv();
      console.log('Initializing database...');
      await initTables(getConnection());
      console.log('✓ Database initialized successfully');
    });

  program
    .command('kanjidic')
    .description('Extract readings from kanjidic2.xml (.gz accepted)')
    .argument('<xml>', 'Path to kanjidic2.xml')
    .option('-o, --out <file>', 'Write the readings as JSON')
    .option('--db', `Load the readings into the database at ${DB_URL_ENV}`)
    .action(async (xml: string, options: { out?: string; db?: boolean }) => {
      if (!options.out && !options.db) {
        throw new Error('Nothing to do: pass --out <file> and/or --db');
      }
      const startTime = Date.now();
      const entries = readKanjidicFile(xml);
      console.log(`Found ${entries.length} characters with readings`);

      if (options.out) {
        exportKanjiJson(entries, options.out);
      }
      if (options.db) {
        connectFromEnv();
        await loadKanjiToDb(getConnection(), entries);
      }
      const elapsed = (Date.now() - startTime) / 1000;
      console.log(`✓ Kanjidic2 processed in ${elapsed.toFixed(1)}s`);
    });

  program
    .command('exceptions')
    .description('Convert an exception CSV (word,reading,type,mora) to the JSON table')
    .argument('<csv>', 'Path to the CSV file')
    .requiredOption('-o, --out <file>', 'Output JSON file')
    .action((csv: string, options: { out: string }) => {
      const table = parseExceptionCsv(fs.readFileSync(csv, 'utf-8'), csv);
      exportExceptionJson(table, options.out);
    });

  return program;
}

async function main(): Promise<void> {
  config();
  try {
    await createProgram().parseAsync();
  } finally {
    await closeConnection();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
