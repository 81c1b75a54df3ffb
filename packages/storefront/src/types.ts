import { z } from 'zod';

/**
 * Catalog tags arrive either as an array or as one comma-separated string,
 * depending on the storefront theme.
 */
const tagsField = z
  .union([z.array(z.string()), z.string()])
  .default([])
  .transform((tags) =>
    typeof tags === 'string'
      ? tags
          .split(',')
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0)
      : tags,
  );

export const storefrontImageSchema = z
  .object({
    id: z.number().nullish(),
    src: z.string(),
    alt: z.string().nullish(),
    position: z.number().nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    variant_ids: z.array(z.number()).default([]),
  })
  .passthrough();

export const storefrontVariantSchema = z
  .object({
    id: z.number(),
    title: z.string(),
    sku: z.string().nullish(),
    price: z.string(),
    compare_at_price: z.string().nullish(),
    available: z.boolean().default(false),
    position: z.number().nullish(),
  })
  .passthrough();

export const storefrontProductSchema = z
  .object({
    id: z.number(),
    title: z.string(),
    handle: z.string(),
    body_html: z.string().nullish(),
    product_type: z.string().nullish(),
    vendor: z.string().nullish(),
    status: z.string().nullish(),
    tags: tagsField,
    image: storefrontImageSchema.nullish(),
    images: z.array(storefrontImageSchema).default([]),
    variants: z.array(storefrontVariantSchema).default([]),
  })
  .passthrough();

export const productsPageSchema = z.object({
  products: z.array(storefrontProductSchema),
});

export type StorefrontImage = z.infer<typeof storefrontImageSchema>;
export type StorefrontVariant = z.infer<typeof storefrontVariantSchema>;
export type StorefrontProduct = z.infer<typeof storefrontProductSchema>;

/** Request identity sent to the storefront. */
export type RequestProfile = 'default' | 'browser';

/** One configured brand; the entity a products run collects. */
export interface BrandTarget {
  key: string;
  name: string;
  /** Null for brands without a public storefront */
  shopUrl: string | null;
  /** Allow the browser request identity when the default one is rejected */
  alternateProfile?: boolean;
}
