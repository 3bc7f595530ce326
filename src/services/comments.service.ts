import type { Comment, Db } from "../db/stores.js";

type NotFound = { ok: false; error: "LISTING_NOT_FOUND"; message: string };

const notFound: NotFound = { ok: false, error: "LISTING_NOT_FOUND", message: "Listing not found" };

export async function addComment(
  db: Db,
  args: { listingId: string; userId: string; title: string; message: string }
): Promise<{ ok: true; comment: Comment } | NotFound> {
  return db.transaction(async (stores) => {
    const listing = await stores.listings.findById(args.listingId);
    if (!listing) return notFound;

    const comment = await stores.comments.insert({
      listingId: listing.id,
      userId: args.userId,
      title: args.title,
      message: args.message,
    });
    return { ok: true as const, comment };
  });
}

export async function listComments(
  db: Db,
  listingId: string
): Promise<{ ok: true; comments: Comment[] } | NotFound> {
  return db.transaction(async (stores) => {
    const listing = await stores.listings.findById(listingId);
    if (!listing) return notFound;

    return { ok: true as const, comments: await stores.comments.listForListing(listing.id) };
  });
}
