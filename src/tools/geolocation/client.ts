/**
 * IP Geolocation Client
 * Resolves an IP address to a coarse location through ipgeolocation.io
 */

import { z } from 'zod';

import { ToolError } from '../types.js';

const GEOLOCATION_URL = 'https://api.ipgeolocation.io/v2/ipgeo';

const geolocationResponseSchema = z.object({
  location: z
    .object({
      country_name: z.string().nullish(),
      state_prov: z.string().nullish(),
      district: z.string().nullish(),
      city: z.string().nullish(),
      zipcode: z.string().nullish(),
    })
    .optional(),
});

export interface Location {
  country: string | null;
  region: string | null;
  city: string | null;
  district: string | null;
  zipcode: string | null;
}

export interface GeolocationClient {
  lookup(ip: string, signal: AbortSignal): Promise<Location>;
}

export interface GeolocationClientConfig {
  apiKey: string | undefined;
  fetchFn?: typeof fetch;
}

export function createGeolocationClient(
  config: GeolocationClientConfig
): GeolocationClient {
  const { apiKey } = config;
  const fetchFn = config.fetchFn ?? fetch;

  return {
    async lookup(ip, signal) {
      if (!apiKey) {
        throw new ToolError(
          'TOOL_FAILURE',
          'Geolocation API key is not configured'
        );
      }

      const url = `${GEOLOCATION_URL}?apiKey=${encodeURIComponent(apiKey)}&ip=${encodeURIComponent(ip)}`;
      const response = await fetchFn(url, { method: 'GET', signal });

      if (!response.ok) {
        const error = await response.text();
        throw new ToolError(
          'TOOL_FAILURE',
          `Geolocation API error: ${response.status} - ${error}`
        );
      }

      const parsed = geolocationResponseSchema.safeParse(await response.json());
      const location = parsed.success ? parsed.data.location : undefined;
      if (!location) {
        throw new ToolError(
          'TOOL_FAILURE',
          `No location data for IP ${ip}`
        );
      }

      return {
        country: location.country_name ?? null,
        region: location.state_prov ?? null,
        city: location.city ?? null,
        district: location.district ?? null,
        zipcode: location.zipcode ?? null,
      };
    },
  };
}
