type SortToken = string | number

/**
 * Splits a name into alternating text and number tokens so that `frame_2.png`
 * orders before `frame_10.png`.
 *
 * Splitting on a capturing digit group always puts text at even positions and
 * numbers at odd positions (the text may be empty), so two keys never hold
 * tokens of different types at the same position.
 */
function naturalSortKey(name: string): SortToken[] {
  return name
    .split(/(\d+)/)
    .map((part, index) => index % 2 === 1 ? Number.parseInt(part, 10) : part.toLowerCase())
}

function compareTokens(a: SortToken, b: SortToken): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

/** Comparator for Array.prototype.sort using natural order */
function compareNatural(a: string, b: string): number {
  const left = naturalSortKey(a)
  const right = naturalSortKey(b)

  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const order = compareTokens(left[i], right[i])
    if (order !== 0) return order
  }

  return left.length - right.length
}

export { compareNatural, naturalSortKey }
export type { SortToken }
