import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { EphemeralPgError, errorMessage } from "../instance/errors.js";
import type { SqlExecutor } from "./executor.js";

/** Table name -> rows; each row maps column names to values. */
export const scenarioSchema = z.record(z.string(), z.array(z.record(z.string(), z.unknown())));
export type Scenario = z.infer<typeof scenarioSchema>;

export class ScenarioError extends EphemeralPgError {
  readonly file: string;
  readonly table: string | undefined;

  constructor(file: string, message: string, options?: { cause?: unknown; table?: string }) {
    super(message, options);
    this.name = "ScenarioError";
    this.file = file;
    this.table = options?.table;
  }
}

/** Parse and validate a YAML scenario document. */
export function parseScenario(content: string, filename: string): Scenario {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ScenarioError(filename, `Invalid YAML in scenario "${filename}": ${errorMessage(err)}`, { cause: err });
  }
  // An empty document loads nothing.
  if (raw === null || raw === undefined) return {};

  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    throw new ScenarioError(filename, `Invalid scenario "${filename}": ${result.error.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Build the INSERT for one row. Columns absent from the row take their defaults. */
export function buildInsert(table: string, row: Record<string, unknown>): { sql: string; params: unknown[] } {
  const columns = Object.keys(row);
  if (columns.length === 0) {
    return { sql: `INSERT INTO ${quoteIdentifier(table)} DEFAULT VALUES`, params: [] };
  }
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(", ")}) VALUES (${placeholders.join(", ")})`,
    params: columns.map((c) => row[c]),
  };
}

/** Insert every row of a parsed scenario, tables in document order. Returns the row count. */
export async function applyScenario(db: SqlExecutor, scenario: Scenario, filename = "<inline>"): Promise<number> {
  let inserted = 0;
  for (const [table, rows] of Object.entries(scenario)) {
    for (const row of rows) {
      const { sql, params } = buildInsert(table, row);
      try {
        await db.query(sql, params);
      } catch (err) {
        throw new ScenarioError(filename, `Failed to insert into ${table}: ${errorMessage(err)}`, {
          cause: err,
          table,
        });
      }
      inserted++;
    }
  }
  return inserted;
}

/**
 * Populate `db` from a YAML "scenario" file. Top-level keys are table names,
 * each holding a list of rows:
 *
 *     users:
 *       - id: 1
 *         name: Alice
 *     posts:
 *       - user_id: 1
 *         title: Hello, world!
 *
 * Tables are filled in the order they appear, so list parents before
 * children when foreign keys are involved.
 */
export async function loadScenario(db: SqlExecutor, filename: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(filename, "utf-8");
  } catch (err) {
    throw new ScenarioError(filename, `Failed to read scenario ${filename}: ${errorMessage(err)}`, { cause: err });
  }

  const inserted = await applyScenario(db, parseScenario(content, filename), filename);
  logger.info(`Loaded ${inserted} row(s) from scenario ${filename}`);
  return inserted;
}
