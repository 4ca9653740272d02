import { describe, expect, it } from 'vitest'
import { renderToStaticMarkup } from 'react-dom/server'
import App from '@/App'

describe('App', () => {
  it('renders the default place in a loading state before the session starts', () => {
    const html = renderToStaticMarkup(<App />)

    expect(html).toContain('Field weather')
    expect(html).toContain('Weather in Manila')
    expect(html).toContain('Fetching the latest conditions…')
    expect(html).toContain('placeholder="Search city (e.g., Davao, Cebu, Baguio)"')
  })
})
