import { z } from 'zod';

// --- Wire shapes returned by the marketplace API ---
//
// Schemas validate without transforming, so a cached payload can be decoded
// again by the same schema. Conversion to domain types lives in client.ts.

const centsString = z.string().regex(/^\d+$/, 'expected an integer amount in cents');

const usdAmount = z.object({
  USD: centsString,
});

export const wireListingSchema = z.object({
  itemId: z.string().min(1),
  title: z.string(),
  gameId: z.string(),
  price: usdAmount,
  suggestedPrice: usdAmount.nullish(),
  extra: z
    .object({
      saleCount: z.number().int().nonnegative().optional(),
    })
    .passthrough()
    .optional(),
});

export const listingPageSchema = z.object({
  objects: z.array(wireListingSchema),
  total: z
    .object({
      offers: z.coerce.number().optional(),
      items: z.coerce.number().optional(),
    })
    .optional(),
  cursor: z.string().nullish(),
});

export const aggregatedPricesSchema = z.object({
  aggregatedPrices: z.array(
    z.object({
      title: z.string(),
      orderBestPrice: centsString.nullish(),
      orderCount: z.number().int().nonnegative().default(0),
      offerBestPrice: centsString.nullish(),
      offerCount: z.number().int().nonnegative().default(0),
    }),
  ),
});

export type WireListing = z.infer<typeof wireListingSchema>;
export type ListingPageResponse = z.infer<typeof listingPageSchema>;
export type AggregatedPricesResponse = z.infer<typeof aggregatedPricesSchema>;
