import type { FastifyReply } from "fastify";
import type { Bid, Category, Comment, Listing, ListingSummary, User } from "../db/stores.js";
import type { ListingState } from "../config/constants/listing.constants.js";
import { formatMoney } from "../shared/utils/money.js";

// Tagged failures from the services, mapped to HTTP.
const FAILURE_STATUS = {
  LISTING_NOT_FOUND: 404,
  FORBIDDEN: 403,
  INVALID_BID: 422,
  LISTING_CLOSED: 409,
  NO_BIDS: 409,
  PERSISTENCE_CONFLICT: 409,
  USERNAME_TAKEN: 409,
  PASSWORD_MISMATCH: 400,
} as const;

export type FailureCode = keyof typeof FAILURE_STATUS;

export function sendFailure(reply: FastifyReply, failure: { error: FailureCode; message: string }) {
  return reply.code(FAILURE_STATUS[failure.error]).send({
    ok: false,
    error: failure.error,
    message: failure.message,
  });
}

function stateOf(listing: Listing): ListingState {
  return listing.isActive ? "open" : "closed";
}

export function presentListing(listing: Listing) {
  return {
    id: listing.id,
    title: listing.title,
    description: listing.description,
    imageUrl: listing.imageUrl,
    startingPrice: formatMoney(listing.priceCents),
    isActive: listing.isActive,
    state: stateOf(listing),
    ownerId: listing.ownerId,
    winnerId: listing.winnerId,
    categoryId: listing.categoryId,
    createdAt: listing.createdAt.toISOString(),
  };
}

export function presentListingSummary(listing: ListingSummary) {
  return {
    ...presentListing(listing),
    category: listing.categoryName,
    currentPrice: formatMoney(listing.currentPriceCents),
    bidCount: listing.bidCount,
  };
}

export function presentBid(bid: Bid) {
  return {
    id: bid.id,
    listingId: bid.listingId,
    bidderId: bid.bidderId,
    value: formatMoney(bid.valueCents),
    placedAt: bid.placedAt.toISOString(),
  };
}

export function presentComment(comment: Comment) {
  return {
    id: comment.id,
    listingId: comment.listingId,
    userId: comment.userId,
    title: comment.title,
    message: comment.message,
    createdAt: comment.createdAt.toISOString(),
  };
}

export function presentCategory(category: Category) {
  return { id: category.id, name: category.name };
}

// never expose passwordHash
export function presentUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    address: user.address,
    phoneNumber: user.phoneNumber,
    createdAt: user.createdAt.toISOString(),
  };
}
