import type { OpenWeatherConfig, PlaceRecord, WeatherReading } from '@/types/weather'
import { resolveClientConfig } from '@/lib/config'
import { PrimaryFetchError, SuggestionFetchError, toErrorMessage } from '@/lib/errors'
import { isRecord, parsePlaceRecords } from '@/lib/place-record'

export const SUGGESTION_LIMIT = 6
const MISSING_DESCRIPTION = '—'

export type FetchLike = (url: string) => Promise<Response>

export interface OpenWeatherRequestOptions {
  config?: OpenWeatherConfig
  fetchImpl?: FetchLike
}

const resolveOptions = ({ config, fetchImpl }: OpenWeatherRequestOptions) => ({
  config: config ?? resolveClientConfig(),
  fetchImpl: fetchImpl ?? ((url: string) => fetch(url)),
})

const buildGeocodingUrl = (config: OpenWeatherConfig, query: string) =>
  `${config.geocodingUrl}?q=${encodeURIComponent(query)}&limit=${SUGGESTION_LIMIT}&appid=${config.apiKey}`

const buildWeatherUrl = (config: OpenWeatherConfig, key: string) =>
  `${config.weatherUrl}?q=${encodeURIComponent(key)}&appid=${config.apiKey}&units=metric`

const readJson = async (response: Response): Promise<unknown> => {
  const body: unknown = await response.json()
  return body
}

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null

const parseWeatherReading = (body: unknown, requestedKey: string): WeatherReading => {
  if (!isRecord(body) || !isRecord(body.main)) {
    throw new PrimaryFetchError('Weather data format error.')
  }
  // An absent condition list is tolerated; a present but empty one is not.
  if (Array.isArray(body.weather) && body.weather.length === 0) {
    throw new PrimaryFetchError('Weather data format error.')
  }

  const main = body.main
  const primary: unknown = Array.isArray(body.weather) ? body.weather[0] : undefined
  const description = isRecord(primary) && typeof primary.description === 'string' && primary.description
    ? primary.description
    : MISSING_DESCRIPTION
  const humidity = finiteOrNull(main.humidity)

  return {
    locationName: typeof body.name === 'string' && body.name ? body.name : requestedKey,
    temperature: finiteOrNull(main.temp),
    humidity: humidity === null ? null : Math.trunc(humidity),
    description,
  }
}

/**
 * Looks up places matching a partial name. Failures of any kind resolve to an
 * empty list: suggestions are an optional affordance and never surface errors.
 */
export const fetchSuggestions = async (
  query: string,
  options: OpenWeatherRequestOptions = {},
): Promise<PlaceRecord[]> => {
  const trimmedQuery = query.trim()
  if (!trimmedQuery) {
    return []
  }

  try {
    const { config, fetchImpl } = resolveOptions(options)
    const response = await fetchImpl(buildGeocodingUrl(config, trimmedQuery))
    if (response.status !== 200) {
      throw new SuggestionFetchError(trimmedQuery, `Geocoding request failed (${response.status}).`)
    }
    return parsePlaceRecords(await readJson(response))
  } catch (error) {
    const failure = error instanceof SuggestionFetchError
      ? error
      : new SuggestionFetchError(trimmedQuery, toErrorMessage(error, 'Geocoding request failed.'))
    if (import.meta.env.DEV) {
      console.warn(`Location suggestions unavailable for "${failure.query}":`, failure.message)
    }
    return []
  }
}

export const fetchCurrentWeather = async (
  key: string,
  options: OpenWeatherRequestOptions = {},
): Promise<WeatherReading> => {
  let resolved: ReturnType<typeof resolveOptions>
  try {
    resolved = resolveOptions(options)
  } catch (error) {
    throw new PrimaryFetchError(toErrorMessage(error, 'Weather service is not configured.'))
  }

  let response: Response
  try {
    response = await resolved.fetchImpl(buildWeatherUrl(resolved.config, key))
  } catch (error) {
    throw new PrimaryFetchError(`Error: ${toErrorMessage(error, 'network request failed')}`)
  }

  if (response.status !== 200) {
    throw new PrimaryFetchError(`Failed to load weather data (${response.status}).`, response.status)
  }

  let body: unknown
  try {
    body = await readJson(response)
  } catch (error) {
    throw new PrimaryFetchError(`Weather data format error: ${toErrorMessage(error, 'invalid JSON')}`)
  }

  return parseWeatherReading(body, key)
}

export const __internal = {
  buildGeocodingUrl,
  buildWeatherUrl,
  parseWeatherReading,
}
