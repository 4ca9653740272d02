import { useEffect, useMemo, useRef, useState } from 'react'
import type { PlaceRecord, SearchState } from '@/types/weather'
import {
  createInitialSearchState,
  createSearchController,
  type SearchController,
  type SearchControllerOptions,
} from '@/lib/search-controller'
import { resolveDefaultPlace } from '@/lib/config'

export interface LocationSearchActions {
  changeText: (text: string) => void
  selectSuggestion: (record: PlaceRecord) => void
  submit: (text: string) => void
  refresh: () => void
  clear: () => void
}

/**
 * Binds one search session to the calling component: the controller is created on
 * mount and disposed on unmount, so timers and late responses never outlive it.
 */
export const useLocationSearch = (options: SearchControllerOptions = {}) => {
  const optionsRef = useRef(options)
  const controllerRef = useRef<SearchController | null>(null)
  const [state, setState] = useState<SearchState>(() =>
    createInitialSearchState(options.initialPrimaryKey ?? resolveDefaultPlace()),
  )

  useEffect(() => {
    const controller = createSearchController(optionsRef.current)
    controllerRef.current = controller
    setState(controller.getState())
    const unsubscribe = controller.subscribe(setState)
    void controller.start()

    return () => {
      unsubscribe()
      controller.dispose()
      controllerRef.current = null
    }
  }, [])

  const actions = useMemo<LocationSearchActions>(() => ({
    changeText: (text) => controllerRef.current?.onTextChanged(text),
    selectSuggestion: (record) => {
      void controllerRef.current?.onSuggestionSelected(record)
    },
    submit: (text) => {
      void controllerRef.current?.onSearchSubmitted(text)
    },
    refresh: () => {
      void controllerRef.current?.onRefresh()
    },
    clear: () => controllerRef.current?.onClear(),
  }), [])

  return { state, actions }
}
