/** Raw `--tag` value: an array when repeated, a number when numeric. */
type RawTag = (number | string)[] | undefined | number | string

/**
 * Normalizes the `--tag` option.
 *
 * @param tag - Raw option value.
 * @returns Tag name.
 */
export function normalizeTag(tag: RawTag): string {
  let value = Array.isArray(tag) ? tag.at(-1) : tag
  let normalized = value === undefined ? '' : String(value).trim()
  if (!normalized) {
    throw new Error('Missing required option "--tag <name>".')
  }
  return normalized
}
