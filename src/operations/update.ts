/**
 * Update Operation Module
 *
 * @module operations/update
 */

import { z } from 'zod';
import type { IndexOperationConfig } from './types.js';
import type { UpdateRequest } from '../types/update.js';

/**
 * Updates one vector's values, sparse values or metadata with `POST /vectors/update`.
 *
 * Resolves to the decoded response body, which the service leaves empty (`{}`);
 * callers should not depend on its content.
 */
export async function update(
  config: IndexOperationConfig,
  request: UpdateRequest
): Promise<unknown> {
  return config.transport.requestJson(
    {
      method: 'POST',
      expectedStatus: 200,
      baseUrl: config.indexUrl,
      path: '/vectors/update',
      body: request,
    },
    z.unknown()
  );
}
