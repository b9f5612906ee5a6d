import { readFile } from 'node:fs/promises';
import { query } from './client.js';

const SCHEMA_PATH = new URL('../sql/schema.sql', import.meta.url);

export function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_PATH, 'utf8');
}

/** Create the state tables if they do not exist yet. */
export async function applySchema(): Promise<void> {
  await query(await readSchemaSql());
}
