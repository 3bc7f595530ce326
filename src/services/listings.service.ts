import type { Category, Comment, Db, Listing, ListingFilter, ListingSummary } from "../db/stores.js";

export async function createListing(
  db: Db,
  ownerId: string,
  input: {
    title: string;
    description: string;
    startingBidCents: number;
    imageUrl?: string | null;
    category: string;
  }
): Promise<{ listing: Listing; category: Category }> {
  return db.transaction(async (stores) => {
    const category = await stores.categories.getOrCreate(input.category);

    const listing = await stores.listings.insert({
      title: input.title,
      description: input.description,
      imageUrl: input.imageUrl ?? null,
      priceCents: input.startingBidCents,
      ownerId,
      categoryId: category.id,
    });

    return { listing, category };
  });
}

export async function listAllListings(db: Db, filter: ListingFilter): Promise<ListingSummary[]> {
  return db.transaction((stores) => stores.listings.list(filter));
}

export type ListingDetail = {
  listing: ListingSummary;
  comments: Comment[];
  watching: boolean;
};

export async function getListingDetail(
  db: Db,
  id: string,
  viewerId: string | null
): Promise<ListingDetail | null> {
  return db.transaction(async (stores) => {
    const listing = await stores.listings.findSummary(id);
    if (!listing) return null;

    const comments = await stores.comments.listForListing(listing.id);
    const watching = viewerId ? await stores.watchlist.has(viewerId, listing.id) : false;

    return { listing, comments, watching };
  });
}

export async function listAllCategories(db: Db): Promise<Category[]> {
  return db.transaction((stores) => stores.categories.list());
}
