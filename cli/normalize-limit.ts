import { DEFAULT_COMMIT_LIMIT } from '../core/constants'

/**
 * Normalizes the `--limit` option.
 *
 * @param limit - Raw option value.
 * @returns Positive integer commit cap.
 */
export function normalizeLimit(limit: undefined | number | string): number {
  if (limit === undefined) {
    return DEFAULT_COMMIT_LIMIT
  }
  let parsed = typeof limit === 'number' ? limit : Number(limit.trim())
  if (Number.isInteger(parsed) && parsed > 0) {
    return parsed
  }
  throw new Error(`Invalid limit "${limit}". Expected a positive integer.`)
}
