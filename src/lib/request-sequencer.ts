export interface RequestSequencer {
  beginRequest: () => number
  isCurrent: (token: number) => boolean
  /** Advances the epoch without issuing a request, so every outstanding token goes stale. */
  invalidate: () => void
  retire: () => void
  current: () => number
}

export const createRequestSequencer = (): RequestSequencer => {
  let epoch = 0
  let retired = false

  return {
    beginRequest: () => {
      epoch += 1
      return epoch
    },
    isCurrent: (token) => !retired && token === epoch,
    invalidate: () => {
      epoch += 1
    },
    retire: () => {
      retired = true
    },
    current: () => epoch,
  }
}
