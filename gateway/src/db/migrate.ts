// Migration runner: applies numbered .sql files from ./migrations in order,
// each inside its own transaction, recording applied names in _migrations.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { query, transaction, close } from "./client.js";

dotenv.config({ path: path.resolve(fileURLToPath(import.meta.url), "../../../../.env") });

const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "migrations");
// Arbitrary constant shared by every runner so two deploys never interleave.
const MIGRATION_LOCK_KEY = 7_340_211;

export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => /^\d+_.+\.sql$/.test(f))
    .sort();
}

async function ensureMigrationsTable(): Promise<void> {
  await query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function migrate(): Promise<void> {
  console.log("[migrate] Running migrations...");
  await ensureMigrationsTable();

  const applied = await transaction(async (client) => {
    await client.query("SELECT pg_advisory_xact_lock($1)", [MIGRATION_LOCK_KEY]);
    const done = await client.query<{ name: string }>("SELECT name FROM _migrations");
    const seen = new Set(done.rows.map((r) => r.name));

    const names: string[] = [];
    for (const file of listMigrationFiles()) {
      if (seen.has(file)) continue;
      const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), "utf-8");
      console.log(`[migrate]   applying ${file}`);
      await client.query(sql);
      await client.query("INSERT INTO _migrations (name) VALUES ($1)", [file]);
      names.push(file);
    }
    return names;
  });

  console.log(
    applied.length === 0
      ? "[migrate] Schema is up to date."
      : `[migrate] Applied ${applied.length} migration(s).`,
  );
  await close();
}

const invokedDirectly = process.argv[1] !== undefined
  && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  migrate().catch((err) => {
    console.error("[migrate] Migration failed:", err);
    process.exit(1);
  });
}
