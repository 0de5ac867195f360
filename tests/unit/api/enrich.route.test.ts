/**
 * Enrich Route Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createTestApp, send, TEST_TOKENS } from '../../helpers/api-utils.js';
import { createFakeSerper } from '../../helpers/test-utils.js';

const token = TEST_TOKENS['user-1'];

describe('Enrich Route', () => {
  describe('POST /enrich', () => {
    it('should return images and offers per product', async () => {
      const { app } = createTestApp({
        serper: createFakeSerper({
          images: () =>
            Promise.resolve([
              { imageUrl: 'https://img.test/a.jpg', imageWidth: 100, imageHeight: 100 },
            ]),
          shopping: () =>
            Promise.resolve([
              {
                title: 'Lamp A',
                link: 'https://shop.test/a',
                source: 'Shop A',
                price: '$25.00',
                delivery: 'Free delivery',
              },
            ]),
        }),
      });

      const res = await send(app, 'POST', '/api/v1/enrich', {
        body: { productNames: ['Lamp A'] },
        token,
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          enrichedProducts: [
            {
              productName: 'Lamp A',
              images: ['https://img.test/a.jpg'],
              shoppingLinks: [
                {
                  source: 'Shop A',
                  link: 'https://shop.test/a',
                  price: '$25.00',
                  delivery: 'Free delivery',
                },
              ],
            },
          ],
        },
        meta: { requestId: expect.any(String) },
      });
    });

    it('should reject invalid arguments as a validation error', async () => {
      const { app } = createTestApp();

      const res = await send(app, 'POST', '/api/v1/enrich', { body: {}, token });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'productNames: Required' },
      });
    });

    it('should report upstream failures', async () => {
      const { app } = createTestApp({
        serper: createFakeSerper({
          images: () => Promise.reject(new Error('Serper API error: 500 - down')),
          shopping: () => Promise.reject(new Error('Serper API error: 500 - down')),
        }),
      });

      const res = await send(app, 'POST', '/api/v1/enrich', {
        body: { productNames: ['Lamp A'] },
        token,
      });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({
        error: { code: 'TOOL_FAILURE', message: 'Serper API error: 500 - down' },
      });
    });

    it('should require authentication', async () => {
      const { app } = createTestApp();

      const res = await send(app, 'POST', '/api/v1/enrich', {
        body: { productNames: ['Lamp A'] },
      });

      expect(res.status).toBe(401);
    });
  });
});
