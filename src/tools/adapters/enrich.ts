/**
 * Enrich Tool
 *
 * Fetches images and shopping offers for each product concurrently and
 * curates them deterministically: the four images closest to square
 * (ties broken by result position) and the first shopping offer.
 *
 * A failed lookup leaves that product with no images or no offers; the call
 * fails only when every lookup failed.
 */

import { z } from 'zod';

import type { ShoppingLink } from '@/types/index.js';

import { defineToolAdapter } from '../define-tool.js';
import type {
  ImageResult,
  SerperClient,
  ShoppingResult,
} from '../serper/client.js';
import type { ToolAdapter } from '../types.js';

const MAX_IMAGES = 4;
const UNRANKED_POSITION = 99;

export const enrichArgsSchema = z.object({
  productNames: z.array(z.string().trim().min(1)).min(1).max(10),
});

export const enrichedProductSchema = z.object({
  productName: z.string(),
  images: z.array(z.string()),
  shoppingLinks: z.array(
    z.object({
      source: z.string(),
      link: z.string(),
      price: z.string(),
      delivery: z.string(),
    })
  ),
});

export const enrichOutputSchema = z.object({
  enrichedProducts: z.array(enrichedProductSchema),
});

export type EnrichedProduct = z.infer<typeof enrichedProductSchema>;
export type EnrichOutput = z.infer<typeof enrichOutputSchema>;

/**
 * Pick the images closest to a 1:1 aspect ratio
 */
export function curateImages(images: ImageResult[]): string[] {
  return images
    .flatMap((image) => {
      const width = image.imageWidth ?? 0;
      const height = image.imageHeight ?? 0;
      if (width <= 0 || height <= 0) {
        return [];
      }
      return [
        {
          closeness: Math.abs(width / height - 1),
          position: image.position ?? UNRANKED_POSITION,
          url: image.imageUrl,
        },
      ];
    })
    .sort((a, b) => a.closeness - b.closeness || a.position - b.position)
    .slice(0, MAX_IMAGES)
    .map((image) => image.url)
    .filter((url) => url.length > 0);
}

/**
 * Keep the first shopping offer
 */
export function curateShoppingLinks(offers: ShoppingResult[]): ShoppingLink[] {
  const first = offers[0];
  if (!first) {
    return [];
  }
  return [
    {
      source: first.source ?? 'N/A',
      link: first.link,
      price: first.price ?? 'Price not available',
      delivery: first.delivery ?? 'Delivery info not available',
    },
  ];
}

export function createEnrichAdapter(deps: { serper: SerperClient }): ToolAdapter {
  const { serper } = deps;

  return defineToolAdapter({
    name: 'enrich',
    description:
      'Fetch product images and a shopping offer for up to 10 named products.',
    inputSchema: {
      type: 'object',
      properties: {
        productNames: {
          type: 'array',
          items: { type: 'string' },
          minItems: 1,
          maxItems: 10,
          description: 'Exact product names to enrich',
        },
      },
      required: ['productNames'],
    },
    args: enrichArgsSchema,
    async handler(args, context) {
      const lookups = await Promise.all(
        args.productNames.map((productName) =>
          Promise.allSettled([
            serper.images(productName, context.signal),
            serper.shopping(productName, context.signal),
          ])
        )
      );

      const failures: unknown[] = lookups
        .flat()
        .flatMap((lookup) =>
          lookup.status === 'rejected' ? [lookup.reason] : []
        );
      if (failures.length === lookups.length * 2) {
        throw failures[0];
      }

      const enrichedProducts = args.productNames.map(
        (productName, index): EnrichedProduct => {
          const [images, offers] = lookups[index] ?? [];
          if (images?.status === 'rejected') {
            console.error(
              `[enrich] Image lookup failed for "${productName}":`,
              images.reason
            );
          }
          if (offers?.status === 'rejected') {
            console.error(
              `[enrich] Shopping lookup failed for "${productName}":`,
              offers.reason
            );
          }
          return {
            productName,
            images:
              images?.status === 'fulfilled' ? curateImages(images.value) : [],
            shoppingLinks:
              offers?.status === 'fulfilled'
                ? curateShoppingLinks(offers.value)
                : [],
          };
        }
      );

      const output: EnrichOutput = { enrichedProducts };
      return output;
    },
  });
}
