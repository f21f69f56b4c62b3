/**
 * Parse flag IDs typed by a user: any separators, one ID per run of digits.
 * @returns Distinct IDs in ascending order
 */
export function parseFlagIds(text: string): number[] {
  const ids = new Set<number>()
  for (const match of text.matchAll(/\d+/g)) {
    const id = Number(match[0])
    if (Number.isSafeInteger(id)) {
      ids.add(id)
    }
  }
  return [...ids].sort((a, b) => a - b)
}
