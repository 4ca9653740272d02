import { describe, expect, it } from 'vitest'
import { renderToStaticMarkup } from 'react-dom/server'
import LocationSearch from '@/components/search/LocationSearch'
import { parsePlaceRecord } from '@/lib/place-record'

const noop = () => undefined

const suggestions = [
  parsePlaceRecord({ name: 'Davao', state: 'Davao del Sur', country: 'PH' }),
  parsePlaceRecord({ name: 'Davao City', country: 'PH' }),
]

const render = (overrides: Partial<Parameters<typeof LocationSearch>[0]> = {}) => renderToStaticMarkup(
  <LocationSearch
    queryText="Dav"
    suggestions={suggestions}
    suggestionsVisible
    onTextChange={noop}
    onSelect={noop}
    onSubmit={noop}
    onClear={noop}
    {...overrides}
  />,
)

describe('LocationSearch', () => {
  it('lists suggestions by display label with the state underneath', () => {
    const html = render()

    expect(html).toContain('Davao, Davao del Sur, PH')
    expect(html).toContain('<span class="text-xs text-slate-500">Davao del Sur</span>')
    expect(html).toContain('Davao City, PH')
  })

  it('hides the list when suggestions are not visible', () => {
    const html = render({ suggestionsVisible: false })

    expect(html).not.toContain('role="listbox"')
  })

  it('hides the list when it is empty', () => {
    const html = render({ suggestions: [] })

    expect(html).not.toContain('role="listbox"')
  })

  it('offers a clear button only when there is text', () => {
    expect(render()).toContain('aria-label="Clear search"')
    expect(render({ queryText: '' })).not.toContain('aria-label="Clear search"')
  })

  it('reflects the query text in the input', () => {
    expect(render({ queryText: 'Davao, Davao del Sur, PH' })).toContain('value="Davao, Davao del Sur, PH"')
  })
})
