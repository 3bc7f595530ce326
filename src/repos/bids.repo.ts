import type { PoolClient } from "pg";
import type { Bid } from "../db/stores.js";
import { centsFromNumeric, formatMoney } from "../shared/utils/money.js";

export type BidRow = {
  id: string;
  listing_id: string;
  user_id: string;
  value: string;
  placed_at: Date;
};

const BID_COLUMNS = `id::text, listing_id::text, user_id::text, value::text, placed_at`;

function toBid(row: BidRow): Bid {
  return {
    id: row.id,
    listingId: row.listing_id,
    bidderId: row.user_id,
    valueCents: centsFromNumeric(row.value),
    placedAt: row.placed_at,
  };
}

export async function insertBid(
  client: PoolClient,
  data: { listingId: string; bidderId: string; valueCents: number; placedAt: Date }
): Promise<Bid> {
  const { rows } = await client.query<BidRow>(
    `
    INSERT INTO bids (listing_id, user_id, value, placed_at)
    VALUES ($1, $2, $3::numeric, $4)
    RETURNING ${BID_COLUMNS}
    `,
    [data.listingId, data.bidderId, formatMoney(data.valueCents), data.placedAt]
  );

  const row = rows[0];
  if (!row) throw new Error("INSERT INTO bids returned no row");
  return toBid(row);
}

export async function getLatestBid(client: PoolClient, listingId: string): Promise<Bid | null> {
  const { rows } = await client.query<BidRow>(
    `
    SELECT ${BID_COLUMNS}
    FROM bids
    WHERE listing_id = $1
    ORDER BY placed_at DESC, id DESC
    LIMIT 1
    `,
    [listingId]
  );
  return rows[0] ? toBid(rows[0]) : null;
}

export async function listBidsForListing(client: PoolClient, listingId: string): Promise<Bid[]> {
  const { rows } = await client.query<BidRow>(
    `
    SELECT ${BID_COLUMNS}
    FROM bids
    WHERE listing_id = $1
    ORDER BY placed_at DESC, id DESC
    `,
    [listingId]
  );
  return rows.map(toBid);
}
