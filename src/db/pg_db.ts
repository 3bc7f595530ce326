// src/db/pg_db.ts
import type { PoolClient } from "pg";

import { withTransaction } from "../config/database.js";
import type { Db, Stores } from "./stores.js";

import { createUser, getUserById, getUserByUsername } from "../repos/users.repo.js";
import { getOrCreateCategory, listCategories } from "../repos/categories.repo.js";
import {
  getListingById,
  getListingSummary,
  insertListing,
  listListings,
  markListingClosed,
} from "../repos/listings.repo.js";
import { getLatestBid, insertBid, listBidsForListing } from "../repos/bids.repo.js";
import { insertComment, listCommentsForListing } from "../repos/comments.repo.js";
import {
  addWatchlistEntry,
  isWatching,
  listWatchedListings,
  removeWatchlistEntry,
} from "../repos/watchlist.repo.js";

/** Binds every repo to one transaction's client. */
export function pgStores(client: PoolClient): Stores {
  return {
    users: {
      insert: (input) => createUser(client, input),
      findById: (id) => getUserById(client, id),
      findByUsername: (username) => getUserByUsername(client, username),
    },
    categories: {
      getOrCreate: (name) => getOrCreateCategory(client, name),
      list: () => listCategories(client),
    },
    listings: {
      insert: (input) => insertListing(client, input),
      findById: (id, opts) => getListingById(client, id, opts),
      findSummary: (id) => getListingSummary(client, id),
      list: (filter) => listListings(client, filter),
      markClosed: (id, winnerId) => markListingClosed(client, id, winnerId),
    },
    bids: {
      insert: (input) => insertBid(client, input),
      findLatest: (listingId) => getLatestBid(client, listingId),
      listForListing: (listingId) => listBidsForListing(client, listingId),
    },
    comments: {
      insert: (input) => insertComment(client, input),
      listForListing: (listingId) => listCommentsForListing(client, listingId),
    },
    watchlist: {
      add: (userId, listingId) => addWatchlistEntry(client, userId, listingId),
      remove: (userId, listingId) => removeWatchlistEntry(client, userId, listingId),
      has: (userId, listingId) => isWatching(client, userId, listingId),
      listForUser: (userId) => listWatchedListings(client, userId),
    },
  };
}

export const pgDb: Db = {
  transaction: (fn) => withTransaction((client) => fn(pgStores(client))),
};
