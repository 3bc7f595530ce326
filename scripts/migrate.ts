import fs from "node:fs/promises";
import path from "node:path";

import { closePool, query } from "../src/config/database.js";
import { logger } from "../src/shared/utils/logger.js";

// Applies every sql/*.sql file in name order. Each file is idempotent.
const dir = process.env.MIGRATIONS_DIR ?? path.resolve(process.cwd(), "sql");

async function main() {
  try {
    const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();

    for (const file of files) {
      const sql = await fs.readFile(path.join(dir, file), "utf8");
      await query(sql);
      logger.info({ file }, "migration applied");
    }
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, "migration failed");
  process.exitCode = 1;
});
