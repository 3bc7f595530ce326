import { z } from "zod";
import { idSchema } from "./common.schema.js";

export const watchlistParamsSchema = z.object({ listingId: idSchema });

export type WatchlistParams = z.infer<typeof watchlistParamsSchema>;
