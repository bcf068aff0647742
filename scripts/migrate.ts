// scripts/migrate.ts
// CLI for database migrations against the configured DATABASE_URL
//
// Usage:
//   npm run migrate                  # Apply all pending migrations
//   npm run migrate -- status        # Show migration status
//   npm run migrate -- up 002        # Apply one version
//   npm run migrate -- down [002]    # Roll back one version (default: last)
//   npm run migrate -- create name   # Create a new migration file

import { createAdapter } from "../src/db/index.js";
import { MigrationRunner } from "../src/migrations/runner.js";

/* ---------- Setup ---------- */
const db = createAdapter();
const runner = new MigrationRunner(db);

class CliError extends Error {}

/* ---------- CLI Commands ---------- */
async function showStatus(): Promise<void> {
  const statuses = await runner.getStatus();

  if (statuses.length === 0) {
    console.log("No migrations found.");
    return;
  }

  console.log("\nMigration Status:");
  console.log("─".repeat(60));

  for (const s of statuses) {
    console.log(`  ${s.version}_${s.name}`);
    console.log(`    Status: ${s.applied ? "✓ Applied" : "○ Pending"}`);
    if (s.appliedAt !== null) {
      console.log(`    Applied: ${new Date(s.appliedAt).toISOString()}`);
    }
    console.log();
  }

  const pending = statuses.filter((s) => !s.applied).length;
  console.log(`Total: ${statuses.length} migrations, ${pending} pending (${db.dbType})`);
}

async function runAll(): Promise<void> {
  const result = await runner.runAll();

  if (result.applied.length === 0 && result.failed.length === 0) {
    console.log("No pending migrations.");
    return;
  }

  for (const name of result.applied) console.log(`  ✓ Applied: ${name}`);
  for (const name of result.failed) console.log(`  ✗ Failed:  ${name}`);

  console.log(`\nApplied: ${result.applied.length}, Failed: ${result.failed.length}`);
  if (result.failed.length > 0) {
    throw new CliError("Migration run stopped at the first failure");
  }
}

async function runUp(version: string): Promise<void> {
  const migration = runner.getAllMigrations().find((m) => m.version === version);
  if (!migration) {
    throw new CliError(`Migration ${version} not found.`);
  }
  await runner.runOne(migration);
  console.log(`✓ Applied: ${migration.version}_${migration.name}`);
}

async function runDown(version: string | undefined): Promise<void> {
  if (version) {
    await runner.rollback(version);
    console.log(`✓ Rolled back: ${version}`);
    return;
  }
  const rolled = await runner.rollbackLast();
  console.log(rolled ? `✓ Rolled back: ${rolled}` : "No migrations to roll back.");
}

function createMigration(name: string | undefined): void {
  // Spaces become underscores; anything else outside [a-z0-9_] is dropped
  const safeName = (name ?? "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_]/g, "");

  if (safeName === "") {
    throw new CliError("Migration name is required.");
  }
  console.log(`✓ Created: ${runner.create(safeName)}`);
}

function printHelp(): void {
  console.log(`
Database Migration CLI

Usage:
  npm run migrate                  Apply all pending migrations
  npm run migrate -- status        Show migration status
  npm run migrate -- up <V>        Apply a specific version
  npm run migrate -- down [V]      Roll back a version (or the last one)
  npm run migrate -- create <N>    Create a new migration file
`);
}

/* ---------- Main ---------- */
async function main(): Promise<void> {
  const [command = "run", param] = process.argv.slice(2);

  switch (command) {
    case "run":
    case "up":
      await (param ? runUp(param) : runAll());
      break;
    case "status":
      await showStatus();
      break;
    case "down":
    case "rollback":
      await runDown(param);
      break;
    case "create":
      createMigration(param);
      break;
    case "help":
    case "--help":
    case "-h":
      printHelp();
      break;
    default:
      throw new CliError(`Unknown command: ${command}. Run 'npm run migrate -- help' for usage.`);
  }
}

main()
  .then(() => db.close())
  .catch(async (err: unknown) => {
    console.error(err instanceof CliError ? err.message : err);
    await db.close();
    process.exit(1);
  });
