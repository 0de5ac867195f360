/**
 * Locate Tool
 * Coarse location of the user, from an explicit IP or the request's client IP
 */

import { z } from 'zod';

import type { GeolocationClient } from '../geolocation/client.js';
import { defineToolAdapter } from '../define-tool.js';
import type { ToolAdapter } from '../types.js';
import { ToolError } from '../types.js';

const LOOPBACK_ADDRESSES = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

/** Public address used in place of loopback during local development */
export const LOOPBACK_FALLBACK_IP = '8.8.8.8';

export const locateArgsSchema = z.object({
  ip: z.string().ip().optional(),
});

export function createLocateAdapter(deps: {
  geolocation: GeolocationClient;
}): ToolAdapter {
  const { geolocation } = deps;

  return defineToolAdapter({
    name: 'locate',
    description:
      "Look up the user's approximate location (country, region, city) to tailor availability and pricing.",
    inputSchema: {
      type: 'object',
      properties: {
        ip: {
          type: 'string',
          description: "IP address to look up. Omit to use the user's own.",
        },
      },
    },
    args: locateArgsSchema,
    async handler(args, context) {
      const ip = args.ip ?? context.clientIp;
      if (ip === undefined) {
        throw new ToolError('TOOL_FAILURE', 'No IP address available to locate');
      }

      const location = await geolocation.lookup(
        LOOPBACK_ADDRESSES.has(ip) ? LOOPBACK_FALLBACK_IP : ip,
        context.signal
      );
      return { ...location };
    },
  });
}
