import { readFile } from "node:fs/promises";

export const SCHEMA_FILE_URL = new URL("../../db/schema.sql", import.meta.url);

export interface SchemaTarget {
  query: (text: string) => Promise<unknown>;
}

export async function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_FILE_URL, "utf8");
}

/** Applies the idempotent schema script in one round trip. */
export async function applySchema(target: SchemaTarget, sql?: string): Promise<void> {
  await target.query(sql ?? (await readSchemaSql()));
}
