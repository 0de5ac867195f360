/**
 * Serper Client
 *
 * Thin HTTP client over the Serper search, shopping, images and scrape
 * endpoints. Responses are validated with zod; anything the API leaves out
 * is optional here.
 */

import { z } from 'zod';

import { ToolError } from '../types.js';

const SEARCH_BASE_URL = 'https://google.serper.dev';
const SCRAPE_URL = 'https://scrape.serper.dev';

const organicResultSchema = z.object({
  title: z.string(),
  link: z.string(),
  snippet: z.string().optional(),
  position: z.number().optional(),
});

const shoppingResultSchema = z.object({
  title: z.string(),
  link: z.string(),
  source: z.string().optional(),
  price: z.string().optional(),
  delivery: z.string().optional(),
  imageUrl: z.string().optional(),
  position: z.number().optional(),
});

const imageResultSchema = z.object({
  title: z.string().optional(),
  imageUrl: z.string(),
  imageWidth: z.number().optional(),
  imageHeight: z.number().optional(),
  position: z.number().optional(),
});

const searchResponseSchema = z.object({
  organic: z.array(organicResultSchema).default([]),
});

const shoppingResponseSchema = z.object({
  shopping: z.array(shoppingResultSchema).default([]),
});

const imagesResponseSchema = z.object({
  images: z.array(imageResultSchema).default([]),
});

const scrapeResponseSchema = z.object({
  text: z.string().default(''),
  metadata: z
    .object({
      title: z.string().optional(),
    })
    .optional(),
});

export type OrganicResult = z.infer<typeof organicResultSchema>;
export type ShoppingResult = z.infer<typeof shoppingResultSchema>;
export type ImageResult = z.infer<typeof imageResultSchema>;
export type ScrapeResult = z.infer<typeof scrapeResponseSchema>;

export interface SerperClient {
  search(query: string, signal: AbortSignal): Promise<OrganicResult[]>;
  shopping(query: string, signal: AbortSignal): Promise<ShoppingResult[]>;
  images(query: string, signal: AbortSignal): Promise<ImageResult[]>;
  scrape(url: string, signal: AbortSignal): Promise<ScrapeResult>;
}

export interface SerperClientConfig {
  apiKey: string;
  /** Override for tests */
  fetchFn?: typeof fetch;
}

/**
 * Create a Serper client
 */
export function createSerperClient(config: SerperClientConfig): SerperClient {
  const { apiKey } = config;
  const fetchFn = config.fetchFn ?? fetch;

  async function post<S extends z.ZodTypeAny>(
    url: string,
    body: Record<string, unknown>,
    schema: S,
    signal: AbortSignal
  ): Promise<z.output<S>> {
    if (!apiKey) {
      throw new ToolError('TOOL_FAILURE', 'Serper API key is not configured');
    }

    const response = await fetchFn(url, {
      method: 'POST',
      headers: {
        'X-API-KEY': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ToolError(
        'TOOL_FAILURE',
        `Serper API error: ${response.status} - ${error}`
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ToolError(
        'TOOL_FAILURE',
        `Unexpected Serper response from ${url}`
      );
    }
    return parsed.data;
  }

  return {
    async search(query, signal) {
      const data = await post(
        `${SEARCH_BASE_URL}/search`,
        { q: query },
        searchResponseSchema,
        signal
      );
      return data.organic;
    },

    async shopping(query, signal) {
      const data = await post(
        `${SEARCH_BASE_URL}/shopping`,
        { q: query },
        shoppingResponseSchema,
        signal
      );
      return data.shopping;
    },

    async images(query, signal) {
      const data = await post(
        `${SEARCH_BASE_URL}/images`,
        { q: query },
        imagesResponseSchema,
        signal
      );
      return data.images;
    },

    scrape(url, signal) {
      return post(SCRAPE_URL, { url }, scrapeResponseSchema, signal);
    },
  };
}
