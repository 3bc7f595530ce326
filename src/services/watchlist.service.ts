import type { Db, ListingSummary } from "../db/stores.js";

type WatchlistChange =
  | { ok: true; changed: boolean }
  | { ok: false; error: "LISTING_NOT_FOUND"; message: string };

// add and remove are both idempotent on an existing listing; `changed` says whether anything happened

export async function addToWatchlist(
  db: Db,
  args: { userId: string; listingId: string }
): Promise<WatchlistChange> {
  return db.transaction(async (stores): Promise<WatchlistChange> => {
    const listing = await stores.listings.findById(args.listingId);
    if (!listing) return { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };

    return { ok: true, changed: await stores.watchlist.add(args.userId, listing.id) };
  });
}

export async function removeFromWatchlist(
  db: Db,
  args: { userId: string; listingId: string }
): Promise<WatchlistChange> {
  return db.transaction(async (stores): Promise<WatchlistChange> => {
    const listing = await stores.listings.findById(args.listingId);
    if (!listing) return { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };

    return { ok: true, changed: await stores.watchlist.remove(args.userId, listing.id) };
  });
}

export async function listWatchlist(db: Db, userId: string): Promise<ListingSummary[]> {
  return db.transaction((stores) => stores.watchlist.listForUser(userId));
}
