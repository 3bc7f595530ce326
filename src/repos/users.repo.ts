// src/repos/users.repo.ts
import type { PoolClient } from "pg";
import type { User } from "../db/stores.js";

export type DbUser = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  address: string | null;
  phone_number: string | null;
  created_at: Date;
};

const USER_COLUMNS = `id::text, username, email, password_hash, address, phone_number, created_at`;

function toUser(row: DbUser): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    address: row.address,
    phoneNumber: row.phone_number,
    createdAt: row.created_at,
  };
}

export async function getUserByUsername(client: PoolClient, username: string): Promise<User | null> {
  const { rows } = await client.query<DbUser>(
    `
    SELECT ${USER_COLUMNS}
    FROM users
    WHERE username = $1
    LIMIT 1
    `,
    [username]
  );
  return rows[0] ? toUser(rows[0]) : null;
}

export async function getUserById(client: PoolClient, id: string): Promise<User | null> {
  const { rows } = await client.query<DbUser>(
    `
    SELECT ${USER_COLUMNS}
    FROM users
    WHERE id = $1
    LIMIT 1
    `,
    [id]
  );
  return rows[0] ? toUser(rows[0]) : null;
}

/** Throws a 23505 unique violation when the username is taken. */
export async function createUser(
  client: PoolClient,
  input: {
    username: string;
    email: string;
    passwordHash: string;
    address?: string | null;
    phoneNumber?: string | null;
  }
): Promise<User> {
  const { rows } = await client.query<DbUser>(
    `
    INSERT INTO users (username, email, password_hash, address, phone_number)
    VALUES ($1, $2, $3, $4, $5)
    RETURNING ${USER_COLUMNS}
    `,
    [input.username, input.email, input.passwordHash, input.address ?? null, input.phoneNumber ?? null]
  );

  const row = rows[0];
  if (!row) throw new Error("INSERT INTO users returned no row");
  return toUser(row);
}
