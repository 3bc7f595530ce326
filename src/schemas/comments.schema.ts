import { z } from "zod";
import { LISTING_LIMITS } from "../config/constants/listing.constants.js";

export const createCommentSchema = z.object({
  title: z.string().trim().min(1).max(LISTING_LIMITS.COMMENT_TITLE_MAX),
  message: z.string().trim().min(1),
});

export type CreateCommentBody = z.infer<typeof createCommentSchema>;
