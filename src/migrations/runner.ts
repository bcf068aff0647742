// src/migrations/runner.ts
// Versioned SQL migrations with up/down support, run through a DbAdapter.
//
// Each file in migrations/ is named NNN_name.sql; up and down SQL are
// separated by a "-- DOWN" marker. Migrations are written in SQLite syntax;
// applyDialectHints() translates them for PostgreSQL.

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "../observability/logger.js";
import type { DbAdapter } from "../db/types.js";

const log = createLogger("migrations");

/* ---------- Types ---------- */
export interface Migration {
  version: string;
  name: string;
  up: string;
  down: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  applied: boolean;
  appliedAt: number | null;
}

/* ---------- Constants ---------- */
const MIGRATION_TABLE = "schema_migrations";
const DOWN_MARKER = "-- DOWN";

/** <repo>/migrations, from both src/migrations and dist/migrations */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../../migrations", import.meta.url));

/* ═══════════════════════════════════════════════════════════════════════════
 * PostgreSQL dialect hints
 * ═════════════════════════════════════════════════════════════════════════ */

/**
 * Translate a SQLite migration for PostgreSQL.
 *
 * Rules applied (in order):
 * 1. Skip PRAGMA statements entirely
 * 2. INTEGER PRIMARY KEY AUTOINCREMENT → BIGSERIAL PRIMARY KEY
 * 3. TEXT /* jsonb *\/ → JSONB (SQLite keeps TEXT and ignores the comment)
 * 4. datetime('now') → NOW()
 */
export function applyDialectHints(sql: string): string {
  return sql
    .split("\n")
    .map((line) => {
      if (/^\s*PRAGMA\s+/i.test(line)) {
        return `-- [pg-skip] ${line}`;
      }
      return line
        .replace(/\bINTEGER\s+PRIMARY\s+KEY\s+AUTOINCREMENT\b/gi, "BIGSERIAL PRIMARY KEY")
        .replace(/\bTEXT\s*\/\*\s*jsonb\s*\*\//gi, "JSONB")
        .replace(/\bdatetime\s*\(\s*'now'\s*\)/gi, "NOW()");
    })
    .join("\n");
}

/* ---------- File Parsing ---------- */

/** Split file content into up and down SQL */
export function parseMigrationContent(content: string): { up: string; down: string } {
  const markerIndex = content.indexOf(DOWN_MARKER);
  if (markerIndex === -1) {
    return { up: content.trim(), down: "" };
  }
  return {
    up: content.slice(0, markerIndex).trim(),
    down: content.slice(markerIndex + DOWN_MARKER.length).trim(),
  };
}

/** "001_initial_schema.sql" → { version: "001", name: "initial_schema" } */
export function parseMigrationFilename(filename: string): { version: string; name: string } | null {
  const match = filename.match(/^(\d+)_(.+)\.sql$/);
  if (!match) return null;
  const [, version, name] = match;
  return version && name ? { version, name } : null;
}

function fullName(migration: Migration): string {
  return `${migration.version}_${migration.name}`;
}

/* ---------- Migration Runner ---------- */
export class MigrationRunner {
  constructor(
    private readonly adapter: DbAdapter,
    private readonly migrationsDir: string = DEFAULT_MIGRATIONS_DIR
  ) {}

  /** Ensure the schema_migrations table exists */
  async ensureMigrationTable(): Promise<void> {
    const ddl = `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at BIGINT NOT NULL
    );`;
    await this.adapter.exec(this.translate(ddl));
  }

  private translate(sql: string): string {
    return this.adapter.dbType === "postgresql" ? applyDialectHints(sql) : sql;
  }

  /** All migration files, sorted by filename */
  getAllMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) return [];

    const files = fs.readdirSync(this.migrationsDir)
      .filter((f) => f.endsWith(".sql"))
      .sort();

    const migrations: Migration[] = [];
    for (const file of files) {
      const parsed = parseMigrationFilename(file);
      if (!parsed) continue;
      const content = fs.readFileSync(path.join(this.migrationsDir, file), "utf-8");
      migrations.push({ ...parsed, ...parseMigrationContent(content) });
    }
    return migrations;
  }

  /** Applied migration names mapped to their applied_at */
  private async getApplied(): Promise<Map<string, number>> {
    await this.ensureMigrationTable();
    const rows = await this.adapter.queryAll<{ name: string; applied_at: number | string }>(
      `SELECT name, applied_at FROM ${MIGRATION_TABLE} ORDER BY id ASC`
    );
    return new Map(rows.map((r) => [r.name, Number(r.applied_at)]));
  }

  async getPending(): Promise<Migration[]> {
    const applied = await this.getApplied();
    return this.getAllMigrations().filter((m) => !applied.has(fullName(m)));
  }

  async getStatus(): Promise<MigrationStatus[]> {
    const applied = await this.getApplied();
    return this.getAllMigrations().map((m) => {
      const appliedAt = applied.get(fullName(m));
      return {
        version: m.version,
        name: m.name,
        applied: appliedAt !== undefined,
        appliedAt: appliedAt ?? null,
      };
    });
  }

  /** Apply one migration (up) inside a transaction */
  async runOne(migration: Migration): Promise<void> {
    const name = fullName(migration);
    const applied = await this.getApplied();
    if (applied.has(name)) {
      throw new Error(`Migration ${name} has already been applied`);
    }

    await this.adapter.transaction(async (tx) => {
      await tx.exec(this.translate(migration.up));
      await tx.run(
        `INSERT INTO ${MIGRATION_TABLE} (name, applied_at) VALUES (?, ?)`,
        [name, Date.now()]
      );
    });
  }

  /** Apply every pending migration, stopping at the first failure */
  async runAll(): Promise<{ applied: string[]; failed: string[] }> {
    const pending = await this.getPending();
    const applied: string[] = [];
    const failed: string[] = [];

    for (const migration of pending) {
      const name = fullName(migration);
      try {
        await this.runOne(migration);
        applied.push(name);
        log.info({ migration: name }, "Applied migration");
      } catch (err) {
        log.error({ err, migration: name }, "Failed to apply migration");
        failed.push(name);
        break;
      }
    }

    return { applied, failed };
  }

  /** Roll back a specific migration (down) */
  async rollback(version: string): Promise<void> {
    const migration = this.getAllMigrations().find((m) => m.version === version);
    if (!migration) {
      throw new Error(`Migration ${version} not found`);
    }

    const name = fullName(migration);
    const applied = await this.getApplied();
    if (!applied.has(name)) {
      throw new Error(`Migration ${name} has not been applied`);
    }
    if (!migration.down) {
      throw new Error(`Migration ${name} has no down migration defined`);
    }

    await this.adapter.transaction(async (tx) => {
      await tx.exec(this.translate(migration.down));
      await tx.run(`DELETE FROM ${MIGRATION_TABLE} WHERE name = ?`, [name]);
    });
  }

  /** Roll back the last applied migration; returns its name, or null */
  async rollbackLast(): Promise<string | null> {
    const names = [...(await this.getApplied()).keys()];
    const last = names[names.length - 1];
    if (!last) return null;

    const version = last.split("_")[0] ?? "";
    await this.rollback(version);
    return last;
  }

  /** Create a new, empty migration file and return its path */
  create(name: string): string {
    const all = this.getAllMigrations();
    const lastVersion = all.length > 0 ? Number.parseInt(all[all.length - 1]?.version ?? "0", 10) : 0;
    const newVersion = String(lastVersion + 1).padStart(3, "0");
    const filePath = path.join(this.migrationsDir, `${newVersion}_${name}.sql`);

    const template = `-- Migration: ${name}
-- Version: ${newVersion}
-- Created: ${new Date().toISOString()}

-- UP migration


${DOWN_MARKER}
-- Rollback SQL (optional)

`;

    fs.mkdirSync(this.migrationsDir, { recursive: true });
    fs.writeFileSync(filePath, template, "utf-8");
    return filePath;
  }
}
