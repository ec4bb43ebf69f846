/**
 * Database schema for the kanji reading tables read by PostgresKanjiSource
 */

import type postgres from 'postgres';

/**
 * Creates the kanji table - One row per character
 */
export const createKanjiTable = (sql: postgres.Sql) => sql`
  CREATE TABLE IF NOT EXISTS kanji (
    id SERIAL PRIMARY KEY,
    text VARCHAR NOT NULL UNIQUE
  )
`;

/**
 * Creates the reading table - On/kun readings, kunyomi keeping their `.` okurigana marker
 */
export const createReadingTable = (sql: postgres.Sql) => sql`
  CREATE TABLE IF NOT EXISTS reading (
    id SERIAL PRIMARY KEY,
    kanji_id INTEGER NOT NULL REFERENCES kanji(id) ON DELETE CASCADE,
    type VARCHAR NOT NULL,
    text VARCHAR NOT NULL
  )
`;

async function createIndexes(sql: postgres.Sql): Promise<void> {
  await sql`CREATE INDEX IF NOT EXISTS reading_kanji_id_idx ON reading(kanji_id)`;
  await sql`CREATE INDEX IF NOT EXISTS reading_type_idx ON reading(type)`;
}

export async function dropAllTables(sql: postgres.Sql): Promise<void> {
  await sql`DROP TABLE IF EXISTS reading CASCADE`;
  await sql`DROP TABLE IF EXISTS kanji CASCADE`;
}

/**
 * Drops and recreates the kanji tables
 */
export async function initTables(sql: postgres.Sql): Promise<void> {
  console.log('Dropping existing tables...');
  await dropAllTables(sql);

  console.log('Creating kanji tables...');
  await createKanjiTable(sql);
  await createReadingTable(sql);

  console.log('Creating indexes...');
  await createIndexes(sql);
}
