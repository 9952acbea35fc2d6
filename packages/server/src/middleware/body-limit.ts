import { bodyLimit } from 'hono/body-limit'
import type { MiddlewareHandler } from 'hono'
import { ContentTooLargeError } from '@docclaims/core/errors'

import { errorResponse } from '../errors.js'

/** 64 KB — ledger requests carry ids, addresses and short labels */
export const DEFAULT_MAX_SIZE = 64 * 1024

/**
 * Creates a Hono body-limit middleware that returns 413 JSON on overflow.
 */
export function createBodyLimit(maxSize: number = DEFAULT_MAX_SIZE): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: () => errorResponse(new ContentTooLargeError({ maxSize })),
  })
}
