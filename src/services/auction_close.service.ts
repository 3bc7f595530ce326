import type { Bid, Db, Listing } from "../db/stores.js";
import { isIntegrityViolation } from "../db/pg_errors.js";

type CloseAuctionResult =
  | { ok: true; listing: Listing; winningBid: Bid }
  | {
      ok: false;
      error: "LISTING_NOT_FOUND" | "FORBIDDEN" | "NO_BIDS" | "PERSISTENCE_CONFLICT";
      message: string;
    };

/**
 * Closes the auction in favour of the bidder with the most recent bid
 * (recency, not amount). A listing without bids stays open.
 *
 * Closing an already-closed listing recomputes the same winner from the
 * same latest bid, since no bids can be added once it is closed.
 */
export async function closeAuction(
  db: Db,
  args: { listingId: string; actorUserId: string }
): Promise<CloseAuctionResult> {
  try {
    return await db.transaction(async (stores): Promise<CloseAuctionResult> => {
      const listing = await stores.listings.findById(args.listingId, { forUpdate: true });
      if (!listing) {
        return { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };
      }

      if (listing.ownerId !== args.actorUserId) {
        return { ok: false, error: "FORBIDDEN", message: "Only the owner can close this auction" };
      }

      const latest = await stores.bids.findLatest(listing.id);
      if (!latest) {
        return { ok: false, error: "NO_BIDS", message: "Auction could not be closed" };
      }

      const closed = await stores.listings.markClosed(listing.id, latest.bidderId);
      if (!closed) {
        return { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };
      }

      return { ok: true, listing: closed, winningBid: latest };
    });
  } catch (err) {
    if (isIntegrityViolation(err)) {
      return { ok: false, error: "PERSISTENCE_CONFLICT", message: "Auction could not be closed" };
    }
    throw err;
  }
}
