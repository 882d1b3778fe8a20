import { loadConfig } from "../config/config.ts";
import { createPostgresProvider } from "./postgres.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.database.url) {
    console.error("Migration failed: no database.url configured (set DATABASE_URL or [database] url)");
    process.exit(1);
  }

  const db = createPostgresProvider({ connectionString: config.database.url });

  try {
    await db.connect();
    console.log("Connected to database");

    await db.runMigrations();
    console.log("Migrations complete");
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await db.disconnect();
  }
}

await main();
