import { z } from "zod";
import { LISTING_LIMITS } from "../config/constants/listing.constants.js";
import { idSchema, moneySchema, pagingQuerySchema } from "./common.schema.js";

export const createListingSchema = z.object({
  title: z.string().trim().min(1).max(LISTING_LIMITS.TITLE_MAX),
  description: z.string().trim().min(1),
  startingBid: moneySchema,
  imageUrl: z.string().url().nullish(),
  category: z.string().trim().min(1).max(LISTING_LIMITS.CATEGORY_NAME_MAX),
});

export const listListingsQuerySchema = pagingQuerySchema.extend({
  categoryId: idSchema.optional(),
  active: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
});

export const placeBidSchema = z.object({
  bid: moneySchema,
});

export type CreateListingBody = z.infer<typeof createListingSchema>;
export type ListListingsQuery = z.infer<typeof listListingsQuerySchema>;
export type PlaceBidBody = z.infer<typeof placeBidSchema>;
