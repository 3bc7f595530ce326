import type { PoolClient } from "pg";
import type { Category } from "../db/stores.js";

type CategoryRow = { id: string; name: string };

export async function getOrCreateCategory(client: PoolClient, name: string): Promise<Category> {
  // unique index on lower(name) makes the lookup case-insensitive
  const inserted = await client.query<CategoryRow>(
    `
    INSERT INTO categories (name)
    VALUES ($1)
    ON CONFLICT ((lower(name))) DO NOTHING
    RETURNING id::text, name
    `,
    [name]
  );
  if (inserted.rows[0]) return inserted.rows[0];

  const { rows } = await client.query<CategoryRow>(
    `
    SELECT id::text, name
    FROM categories
    WHERE lower(name) = lower($1)
    LIMIT 1
    `,
    [name]
  );

  const row = rows[0];
  if (!row) throw new Error(`Category "${name}" vanished between insert and select`);
  return row;
}

export async function listCategories(client: PoolClient): Promise<Category[]> {
  const { rows } = await client.query<CategoryRow>(
    `SELECT id::text, name FROM categories ORDER BY lower(name), id`
  );
  return rows;
}
