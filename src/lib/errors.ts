export class MalformedRecordError extends Error {
  constructor(message = 'Geocoding entry is not an object.') {
    super(message)
    this.name = 'MalformedRecordError'
  }
}

export class SuggestionFetchError extends Error {
  readonly query: string

  constructor(query: string, message: string) {
    super(message)
    this.name = 'SuggestionFetchError'
    this.query = query
  }
}

/** Raised by the current-weather lookup; `message` is shown to the user as-is. */
export class PrimaryFetchError extends Error {
  readonly status?: number

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'PrimaryFetchError'
    this.status = status
  }
}

export const toErrorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error && error.message ? error.message : fallback
