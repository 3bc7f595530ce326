import type { PoolClient } from "pg";
import type { Comment } from "../db/stores.js";

type CommentRow = {
  id: string;
  listing_id: string;
  user_id: string;
  title: string;
  message: string;
  created_at: Date;
};

const COMMENT_COLUMNS = `id::text, listing_id::text, user_id::text, title, message, created_at`;

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    listingId: row.listing_id,
    userId: row.user_id,
    title: row.title,
    message: row.message,
    createdAt: row.created_at,
  };
}

export async function insertComment(
  client: PoolClient,
  input: { listingId: string; userId: string; title: string; message: string }
): Promise<Comment> {
  const { rows } = await client.query<CommentRow>(
    `
    INSERT INTO comments (listing_id, user_id, title, message)
    VALUES ($1, $2, $3, $4)
    RETURNING ${COMMENT_COLUMNS}
    `,
    [input.listingId, input.userId, input.title, input.message]
  );

  const row = rows[0];
  if (!row) throw new Error("INSERT INTO comments returned no row");
  return toComment(row);
}

export async function listCommentsForListing(client: PoolClient, listingId: string): Promise<Comment[]> {
  const { rows } = await client.query<CommentRow>(
    `
    SELECT ${COMMENT_COLUMNS}
    FROM comments
    WHERE listing_id = $1
    ORDER BY created_at ASC, id ASC
    `,
    [listingId]
  );
  return rows.map(toComment);
}
