import type { PoolClient } from "pg";
import type { ListingSummary } from "../db/stores.js";
import { SUMMARY_SELECT, toListingSummary, type ListingSummaryRow } from "./listings.repo.js";

export async function addWatchlistEntry(
  client: PoolClient,
  userId: string,
  listingId: string
): Promise<boolean> {
  const { rowCount } = await client.query(
    `
    INSERT INTO watchlist (user_id, listing_id)
    VALUES ($1, $2)
    ON CONFLICT (user_id, listing_id) DO NOTHING
    `,
    [userId, listingId]
  );
  return (rowCount ?? 0) > 0;
}

export async function removeWatchlistEntry(
  client: PoolClient,
  userId: string,
  listingId: string
): Promise<boolean> {
  const { rowCount } = await client.query(
    `DELETE FROM watchlist WHERE user_id = $1 AND listing_id = $2`,
    [userId, listingId]
  );
  return (rowCount ?? 0) > 0;
}

export async function isWatching(client: PoolClient, userId: string, listingId: string): Promise<boolean> {
  const { rows } = await client.query<{ watching: boolean }>(
    `
    SELECT EXISTS (
      SELECT 1 FROM watchlist WHERE user_id = $1 AND listing_id = $2
    ) AS watching
    `,
    [userId, listingId]
  );
  return rows[0]?.watching ?? false;
}

export async function listWatchedListings(client: PoolClient, userId: string): Promise<ListingSummary[]> {
  const { rows } = await client.query<ListingSummaryRow>(
    `
    ${SUMMARY_SELECT}
    JOIN watchlist w ON w.listing_id = l.id
    WHERE w.user_id = $1
    ORDER BY w.created_at DESC, l.id DESC
    `,
    [userId]
  );
  return rows.map(toListingSummary);
}
