import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { logger } from "../config/logger.js";
import { EphemeralPgError, errorMessage } from "../instance/errors.js";
import type { SqlExecutor } from "./executor.js";

const MIGRATION_SUFFIX = ".up.sql";

export class MigrationError extends EphemeralPgError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MigrationError";
    this.file = file;
  }
}

/**
 * Execute every `*.up.sql` file in `migrationDir`, in lexicographic order,
 * against `db`. Number the files to control ordering:
 *
 *     001_create_users.up.sql
 *     002_create_posts.up.sql
 *
 * Nothing records which files already ran; this is meant for initialising a
 * fresh test database, not for migrating a long-lived one.
 *
 * @returns the file names applied, in order
 */
export async function runMigrations(db: SqlExecutor, migrationDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(migrationDir);
  } catch (err) {
    throw new MigrationError(migrationDir, `Failed to list migrations in ${migrationDir}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const files = entries.filter((f) => f.endsWith(MIGRATION_SUFFIX)).sort();

  for (const file of files) {
    let sql: string;
    try {
      sql = await readFile(path.join(migrationDir, file), "utf-8");
    } catch (err) {
      throw new MigrationError(file, `Failed to read migration ${file}: ${errorMessage(err)}`, { cause: err });
    }

    try {
      await db.exec(sql);
    } catch (err) {
      throw new MigrationError(file, `Migration ${file} failed: ${errorMessage(err)}`, { cause: err });
    }
    logger.debug(`Applied migration ${file}`);
  }

  logger.info(`Applied ${files.length} migration(s) from ${migrationDir}`);
  return files;
}
