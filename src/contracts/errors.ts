/**
 * Raised for bad command-line input; the CLI prints usage and exits 2
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
