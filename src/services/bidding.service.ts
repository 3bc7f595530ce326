import type { Bid, Db, Listing } from "../db/stores.js";
import { isIntegrityViolation } from "../db/pg_errors.js";

export type BidRejection = "INVALID_BID" | "LISTING_CLOSED";

export type BidDecision = { ok: true } | { ok: false; error: BidRejection; message: string };

/**
 * Acceptance rule:
 * - with a latest bid, the proposal must be strictly greater (ties lose)
 * - without one, it must be at least the starting price
 */
export function evaluateBid(
  listing: Pick<Listing, "priceCents" | "isActive">,
  proposedCents: number,
  latestBid: Pick<Bid, "valueCents"> | null
): BidDecision {
  if (!listing.isActive) {
    return { ok: false, error: "LISTING_CLOSED", message: "Auction is closed" };
  }

  const accepted = latestBid
    ? proposedCents > latestBid.valueCents
    : proposedCents >= listing.priceCents;

  return accepted ? { ok: true } : { ok: false, error: "INVALID_BID", message: "Bid is not valid" };
}

export type PlaceBidResult =
  | { ok: true; bid: Bid; currentPriceCents: number }
  | {
      ok: false;
      error: "LISTING_NOT_FOUND" | "PERSISTENCE_CONFLICT" | BidRejection;
      message: string;
    };

export async function placeBid(
  db: Db,
  args: { listingId: string; bidderId: string; valueCents: number },
  now: () => Date = () => new Date()
): Promise<PlaceBidResult> {
  try {
    return await db.transaction(async (stores): Promise<PlaceBidResult> => {
      // row lock serializes bidders on this listing until commit
      const listing = await stores.listings.findById(args.listingId, { forUpdate: true });
      if (!listing) {
        return { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };
      }

      const latest = await stores.bids.findLatest(listing.id);
      const decision = evaluateBid(listing, args.valueCents, latest);
      if (!decision.ok) return decision;

      const bid = await stores.bids.insert({
        listingId: listing.id,
        bidderId: args.bidderId,
        valueCents: args.valueCents,
        placedAt: now(),
      });

      return { ok: true, bid, currentPriceCents: bid.valueCents };
    });
  } catch (err) {
    if (isIntegrityViolation(err)) {
      return { ok: false, error: "PERSISTENCE_CONFLICT", message: "Bid could not be placed" };
    }
    throw err;
  }
}

/** Bid history, latest first; null when the listing does not exist. */
export async function listBids(db: Db, listingId: string): Promise<Bid[] | null> {
  return db.transaction(async (stores) => {
    const listing = await stores.listings.findById(listingId);
    if (!listing) return null;
    return stores.bids.listForListing(listing.id);
  });
}
