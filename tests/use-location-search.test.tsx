// @vitest-environment jsdom
import { describe, expect, it, vi } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import type { PlaceRecord, WeatherReading } from '@/types/weather'
import { useLocationSearch } from '@/hooks/useLocationSearch'
import { parsePlaceRecord } from '@/lib/place-record'

const cebu = parsePlaceRecord({ name: 'Cebu City', state: 'Central Visayas', country: 'PH' })

const reading = (locationName: string): WeatherReading => ({
  locationName,
  temperature: 28,
  humidity: 75,
  description: 'light rain',
})

const sleep = (ms: number) => new Promise<void>((resolve) => {
  setTimeout(resolve, ms)
})

const renderSearch = () => {
  const fetchSuggestions = vi.fn(async (_query: string): Promise<PlaceRecord[]> => [cebu])
  const fetchPrimary = vi.fn(async (key: string) => reading(key))
  const hook = renderHook(() => useLocationSearch({
    fetchSuggestions,
    fetchPrimary,
    debounceMs: 10,
    initialPrimaryKey: 'Manila',
  }))
  return { ...hook, fetchSuggestions, fetchPrimary }
}

describe('useLocationSearch', () => {
  it('loads the initial place once mounted', async () => {
    const { result, unmount, fetchPrimary } = renderSearch()

    await waitFor(() => expect(result.current.state.primaryState).toEqual({
      status: 'ready',
      reading: reading('Manila'),
    }))
    expect(fetchPrimary).toHaveBeenCalledTimes(1)
    expect(fetchPrimary).toHaveBeenCalledWith('Manila')

    unmount()
  })

  it('re-renders with every controller update', async () => {
    const { result, unmount, fetchSuggestions } = renderSearch()

    act(() => {
      result.current.actions.changeText('Cebu')
    })
    expect(result.current.state.queryText).toBe('Cebu')

    await waitFor(() => expect(result.current.state.suggestionsVisible).toBe(true))
    expect(result.current.state.suggestions).toEqual([cebu])
    expect(fetchSuggestions).toHaveBeenCalledWith('Cebu')

    unmount()
  })

  it('disposes the session on unmount', async () => {
    const { result, unmount, fetchSuggestions, fetchPrimary } = renderSearch()
    await waitFor(() => expect(result.current.state.primaryState.status).toBe('ready'))
    const { actions } = result.current

    act(() => {
      actions.changeText('Ceb')
    })
    unmount()
    await sleep(50)

    expect(fetchSuggestions).not.toHaveBeenCalled()

    actions.refresh()
    actions.changeText('Davao')
    await sleep(50)

    expect(fetchPrimary).toHaveBeenCalledTimes(1)
    expect(fetchSuggestions).not.toHaveBeenCalled()
  })
})
