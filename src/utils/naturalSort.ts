const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' })

/**
 * Compare strings the way a person reads them: "trap2" before "trap10"
 */
export const naturalCompare = (a: string, b: string): number => {
  const result = collator.compare(a, b)
  // Keep the order total for names that differ only in case
  if (result === 0 && a !== b) {
    return a < b ? -1 : 1
  }
  return result
}

export const naturalSort = (values: Iterable<string>): string[] =>
  Array.from(values).sort(naturalCompare)
