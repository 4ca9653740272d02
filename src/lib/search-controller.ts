import type { PlaceRecord, PrimaryState, SearchState, WeatherReading } from '@/types/weather'
import { resolveDefaultPlace } from '@/lib/config'
import { createDebouncer, DEFAULT_DEBOUNCE_MS } from '@/lib/debouncer'
import { toErrorMessage } from '@/lib/errors'
import { formatDisplayLabel, formatQueryKey } from '@/lib/place-record'
import { createRequestSequencer } from '@/lib/request-sequencer'
import { fetchCurrentWeather, fetchSuggestions } from '@/services/openWeather'

export interface SearchControllerOptions {
  fetchSuggestions?: (query: string) => Promise<PlaceRecord[]>
  fetchPrimary?: (key: string) => Promise<WeatherReading>
  debounceMs?: number
  initialPrimaryKey?: string
}

export type SearchListener = (state: SearchState) => void

export interface SearchController {
  getState: () => SearchState
  subscribe: (listener: SearchListener) => () => void
  /** Loads the initial place once; later calls are ignored. */
  start: () => Promise<void>
  onTextChanged: (text: string) => void
  onDebounceFired: (text: string) => Promise<void>
  onSuggestionSelected: (record: PlaceRecord) => Promise<void>
  onPrimaryKeyChanged: (key: string) => Promise<void>
  onSearchSubmitted: (text: string) => Promise<void>
  onRefresh: () => Promise<void>
  onClear: () => void
  dispose: () => void
}

const LOADING: PrimaryState = { status: 'loading' }
const PRIMARY_FALLBACK_MESSAGE = 'Unable to load weather data right now.'

export const createInitialSearchState = (primaryKey: string): SearchState => ({
  queryText: '',
  suggestions: [],
  suggestionsVisible: false,
  requestEpoch: 0,
  primaryKey,
  primaryState: LOADING,
})

export const createSearchController = ({
  fetchSuggestions: loadSuggestions = (query) => fetchSuggestions(query),
  fetchPrimary = (key) => fetchCurrentWeather(key),
  debounceMs = DEFAULT_DEBOUNCE_MS,
  initialPrimaryKey = resolveDefaultPlace(),
}: SearchControllerOptions = {}): SearchController => {
  const sequencer = createRequestSequencer()
  const listeners = new Set<SearchListener>()
  let state = createInitialSearchState(initialPrimaryKey)
  let started = false
  let disposed = false

  const update = (patch: Partial<Omit<SearchState, 'requestEpoch'>>) => {
    if (disposed) {
      return
    }
    state = { ...state, ...patch, requestEpoch: sequencer.current() }
    listeners.forEach((listener) => listener(state))
  }

  const hideSuggestions = () => {
    sequencer.invalidate()
    update({ suggestions: [], suggestionsVisible: false })
  }

  const onDebounceFired = async (text: string) => {
    if (disposed) {
      return
    }

    const token = sequencer.beginRequest()
    update({})

    let results: PlaceRecord[]
    try {
      results = await loadSuggestions(text)
    } catch (error) {
      if (import.meta.env.DEV) {
        console.warn('Suggestion lookup failed:', error)
      }
      results = []
    }

    if (!sequencer.isCurrent(token)) {
      return
    }
    update({ suggestions: results, suggestionsVisible: results.length > 0 })
  }

  const debouncer = createDebouncer({
    wait: debounceMs,
    onFire: (text) => {
      void onDebounceFired(text)
    },
    onClear: hideSuggestions,
  })

  // Last write wins: overlapping lookups are not sequenced against each other.
  const onPrimaryKeyChanged = async (key: string) => {
    if (disposed) {
      return
    }

    update({ primaryKey: key, primaryState: LOADING })
    try {
      const reading = await fetchPrimary(key)
      update({ primaryState: { status: 'ready', reading } })
    } catch (error) {
      update({ primaryState: { status: 'failed', message: toErrorMessage(error, PRIMARY_FALLBACK_MESSAGE) } })
    }
  }

  const onTextChanged = (text: string) => {
    if (disposed) {
      return
    }
    update({ queryText: text })
    debouncer.notify(text)
  }

  const onSuggestionSelected = (record: PlaceRecord) => {
    debouncer.cancel()
    update({ queryText: formatDisplayLabel(record) })
    hideSuggestions()
    return onPrimaryKeyChanged(formatQueryKey(record))
  }

  const onSearchSubmitted = async (text: string) => {
    const key = text.trim()
    if (!key) {
      return
    }
    debouncer.cancel()
    hideSuggestions()
    await onPrimaryKeyChanged(key)
  }

  return {
    getState: () => state,
    subscribe: (listener) => {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    start: async () => {
      if (started) {
        return
      }
      started = true
      await onPrimaryKeyChanged(state.primaryKey)
    },
    onTextChanged,
    onDebounceFired,
    onSuggestionSelected,
    onPrimaryKeyChanged,
    onSearchSubmitted,
    onRefresh: () => onPrimaryKeyChanged(state.primaryKey),
    onClear: () => onTextChanged(''),
    dispose: () => {
      debouncer.cancel()
      sequencer.retire()
      disposed = true
      listeners.clear()
    },
  }
}
