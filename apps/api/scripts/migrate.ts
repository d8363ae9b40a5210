import crypto from "crypto";
import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import pg from "pg";

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  console.error("ERROR: DATABASE_URL not set in environment");
  process.exit(1);
}

console.log(`Running migrations against: ${DATABASE_URL.replace(/:[^:@]+@/, ":****@")}`);

const migrationDir = path.resolve(__dirname, "..", "migrations");
const MIGRATION_FILENAME_RE = /^[0-9]{3}_[A-Za-z0-9_-]+\.sql$/;

function hashFile(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return crypto.createHash("sha256").update(content).digest("hex");
}

async function main(connectionString: string) {
  const client = new pg.Client({ connectionString });
  await client.connect();
  try {
    // Ensure schema_migrations tracking table exists (with checksum column)
    await client.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      content_hash TEXT
    )`);

    const applied = await client.query<{ filename: string; content_hash: string | null }>(
      "SELECT filename, content_hash FROM schema_migrations ORDER BY filename"
    );
    const appliedMap = new Map<string, string>();
    for (const row of applied.rows) {
      appliedMap.set(row.filename, row.content_hash || "");
    }

    const migrations = fs
      .readdirSync(migrationDir)
      .filter((entry) => MIGRATION_FILENAME_RE.test(entry))
      .sort((a, b) => a.localeCompare(b, "en"));

    // Drift detection: warn if an already-applied migration file has changed on disk
    let driftCount = 0;
    for (const migration of migrations) {
      const storedHash = appliedMap.get(migration);
      if (!storedHash) continue;
      const diskHash = hashFile(path.join(migrationDir, migration));
      if (diskHash !== storedHash) {
        console.warn(
          `  WARNING: ${migration} has changed since it was applied (expected ${storedHash.slice(0, 12)}…, got ${diskHash.slice(0, 12)}…)`
        );
        driftCount++;
      }
    }
    if (driftCount > 0) {
      console.warn(`\n${driftCount} migration(s) have drifted from their applied versions. Review before proceeding.\n`);
    }

    let ranCount = 0;
    for (const migration of migrations) {
      if (appliedMap.has(migration)) continue;

      console.log(`\nRunning ${migration}...`);
      const filePath = path.join(migrationDir, migration);
      const contentHash = hashFile(filePath);
      await client.query("BEGIN");
      try {
        await client.query(fs.readFileSync(filePath, "utf-8"));
        await client.query("INSERT INTO schema_migrations (filename, content_hash) VALUES ($1, $2)", [
          migration,
          contentHash,
        ]);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
      console.log(`  ${migration} completed (hash: ${contentHash.slice(0, 12)}…)`);
      ranCount++;
    }

    if (ranCount === 0) {
      console.log("\nAll migrations already applied; nothing to do.");
    } else {
      console.log(`\n${ranCount} migration(s) applied successfully!`);
    }
  } finally {
    await client.end();
  }
}

main(DATABASE_URL).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Migration failed: ${message}`);
  process.exit(1);
});
