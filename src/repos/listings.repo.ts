import type { PoolClient } from "pg";
import type { Listing, ListingFilter, ListingSummary } from "../db/stores.js";
import { centsFromNumeric, formatMoney } from "../shared/utils/money.js";

export type ListingRow = {
  id: string;
  title: string;
  description: string;
  image_url: string | null;
  price: string;
  is_active: boolean;
  owner_id: string;
  winner_id: string | null;
  category_id: string;
  created_at: Date;
};

export type ListingSummaryRow = ListingRow & {
  category_name: string;
  current_price: string;
  bid_count: number;
};

const LISTING_COLUMNS = `
  l.id::text, l.title, l.description, l.image_url, l.price::text, l.is_active,
  l.owner_id::text, l.winner_id::text, l.category_id::text, l.created_at
`;

// current price = latest bid (by placed_at, then id) or the starting price.
// Callers append further joins and the WHERE clause.
export const SUMMARY_SELECT = `
  SELECT ${LISTING_COLUMNS},
         c.name AS category_name,
         COALESCE(latest.value, l.price)::text AS current_price,
         (SELECT count(*) FROM bids b WHERE b.listing_id = l.id)::int AS bid_count
  FROM listings l
  JOIN categories c ON c.id = l.category_id
  LEFT JOIN LATERAL (
    SELECT value
    FROM bids
    WHERE listing_id = l.id
    ORDER BY placed_at DESC, id DESC
    LIMIT 1
  ) latest ON true
`;

export function toListing(row: ListingRow): Listing {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    imageUrl: row.image_url,
    priceCents: centsFromNumeric(row.price),
    isActive: row.is_active,
    ownerId: row.owner_id,
    winnerId: row.winner_id,
    categoryId: row.category_id,
    createdAt: row.created_at,
  };
}

export function toListingSummary(row: ListingSummaryRow): ListingSummary {
  return {
    ...toListing(row),
    categoryName: row.category_name,
    currentPriceCents: centsFromNumeric(row.current_price),
    bidCount: row.bid_count,
  };
}

export async function insertListing(
  client: PoolClient,
  data: {
    title: string;
    description: string;
    imageUrl: string | null;
    priceCents: number;
    ownerId: string;
    categoryId: string;
  }
): Promise<Listing> {
  const { rows } = await client.query<ListingRow>(
    `
    INSERT INTO listings AS l (title, description, image_url, price, owner_id, category_id)
    VALUES ($1, $2, $3, $4::numeric, $5, $6)
    RETURNING ${LISTING_COLUMNS}
    `,
    [data.title, data.description, data.imageUrl, formatMoney(data.priceCents), data.ownerId, data.categoryId]
  );

  const row = rows[0];
  if (!row) throw new Error("INSERT INTO listings returned no row");
  return toListing(row);
}

export async function getListingById(
  client: PoolClient,
  id: string,
  opts: { forUpdate?: boolean } = {}
): Promise<Listing | null> {
  const { rows } = await client.query<ListingRow>(
    `
    SELECT ${LISTING_COLUMNS}
    FROM listings l
    WHERE l.id = $1
    LIMIT 1
    ${opts.forUpdate ? "FOR UPDATE" : ""}
    `,
    [id]
  );
  return rows[0] ? toListing(rows[0]) : null;
}

export async function getListingSummary(client: PoolClient, id: string): Promise<ListingSummary | null> {
  const { rows } = await client.query<ListingSummaryRow>(`${SUMMARY_SELECT} WHERE l.id = $1`, [id]);
  return rows[0] ? toListingSummary(rows[0]) : null;
}

export async function listListings(client: PoolClient, filter: ListingFilter): Promise<ListingSummary[]> {
  const where: string[] = [];
  const params: unknown[] = [];

  if (typeof filter.categoryId !== "undefined") {
    params.push(filter.categoryId);
    where.push(`l.category_id = $${params.length}`);
  }
  if (typeof filter.active !== "undefined") {
    params.push(filter.active);
    where.push(`l.is_active = $${params.length}`);
  }

  params.push(filter.limit, filter.offset);

  const { rows } = await client.query<ListingSummaryRow>(
    `
    ${SUMMARY_SELECT}
    ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
    ORDER BY l.created_at DESC, l.id DESC
    LIMIT $${params.length - 1} OFFSET $${params.length}
    `,
    params
  );
  return rows.map(toListingSummary);
}

export async function markListingClosed(
  client: PoolClient,
  id: string,
  winnerId: string
): Promise<Listing | null> {
  const { rows } = await client.query<ListingRow>(
    `
    UPDATE listings AS l
    SET is_active = false,
        winner_id = $2
    WHERE l.id = $1
    RETURNING ${LISTING_COLUMNS}
    `,
    [id, winnerId]
  );
  return rows[0] ? toListing(rows[0]) : null;
}
