// src/db/stores.ts
// Domain records and the store contracts the services depend on.
// Money is integer cents throughout.

export type User = {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  address: string | null;
  phoneNumber: string | null;
  createdAt: Date;
};

export type Category = {
  id: string;
  name: string;
};

export type Listing = {
  id: string;
  title: string;
  description: string;
  imageUrl: string | null;
  priceCents: number;
  isActive: boolean;
  ownerId: string;
  winnerId: string | null;
  categoryId: string;
  createdAt: Date;
};

/** Listing plus the figures every listing page shows. */
export type ListingSummary = Listing & {
  categoryName: string;
  currentPriceCents: number;
  bidCount: number;
};

export type Bid = {
  id: string;
  listingId: string;
  bidderId: string;
  valueCents: number;
  placedAt: Date;
};

export type Comment = {
  id: string;
  listingId: string;
  userId: string;
  title: string;
  message: string;
  createdAt: Date;
};

export type UserStore = {
  insert(input: {
    username: string;
    email: string;
    passwordHash: string;
    address?: string | null;
    phoneNumber?: string | null;
  }): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
};

export type CategoryStore = {
  /** Case-insensitive on name; creates the category when missing. */
  getOrCreate(name: string): Promise<Category>;
  list(): Promise<Category[]>;
};

export type ListingFilter = {
  limit: number;
  offset: number;
  categoryId?: string;
  active?: boolean;
};

export type ListingStore = {
  insert(input: {
    title: string;
    description: string;
    imageUrl: string | null;
    priceCents: number;
    ownerId: string;
    categoryId: string;
  }): Promise<Listing>;
  /** forUpdate locks the row until the surrounding transaction ends. */
  findById(id: string, opts?: { forUpdate?: boolean }): Promise<Listing | null>;
  findSummary(id: string): Promise<ListingSummary | null>;
  list(filter: ListingFilter): Promise<ListingSummary[]>;
  /** Sets is_active = false and the winner in a single update. */
  markClosed(id: string, winnerId: string): Promise<Listing | null>;
};

export type BidStore = {
  insert(input: {
    listingId: string;
    bidderId: string;
    valueCents: number;
    placedAt: Date;
  }): Promise<Bid>;
  /** Bid with the greatest placedAt; ties go to the later insert. */
  findLatest(listingId: string): Promise<Bid | null>;
  /** Latest first. */
  listForListing(listingId: string): Promise<Bid[]>;
};

export type CommentStore = {
  insert(input: { listingId: string; userId: string; title: string; message: string }): Promise<Comment>;
  /** Oldest first. */
  listForListing(listingId: string): Promise<Comment[]>;
};

export type WatchlistStore = {
  /** Returns false when the entry already existed. */
  add(userId: string, listingId: string): Promise<boolean>;
  /** Returns false when there was nothing to remove. */
  remove(userId: string, listingId: string): Promise<boolean>;
  has(userId: string, listingId: string): Promise<boolean>;
  /** Most recently added first. */
  listForUser(userId: string): Promise<ListingSummary[]>;
};

export type Stores = {
  users: UserStore;
  categories: CategoryStore;
  listings: ListingStore;
  bids: BidStore;
  comments: CommentStore;
  watchlist: WatchlistStore;
};

/**
 * Every service call runs its store work inside one transaction;
 * a thrown error rolls all of it back.
 */
export type Db = {
  transaction<T>(fn: (stores: Stores) => Promise<T>): Promise<T>;
};
