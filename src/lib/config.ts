import type { OpenWeatherConfig } from '@/types/weather'

export const DEFAULT_GEOCODING_URL = 'https://api.openweathermap.org/geo/1.0/direct'
export const DEFAULT_WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather'
export const DEFAULT_PLACE = 'Manila'

export interface ClientEnv {
  VITE_OPENWEATHER_API_KEY?: string
  VITE_OPENWEATHER_GEOCODING_URL?: string
  VITE_OPENWEATHER_WEATHER_URL?: string
  VITE_DEFAULT_PLACE?: string
}

const nonEmpty = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export const resolveClientConfig = (env: ClientEnv = import.meta.env): OpenWeatherConfig => {
  const apiKey = nonEmpty(env.VITE_OPENWEATHER_API_KEY)
  if (!apiKey) {
    throw new Error('Missing OpenWeather API key. Add VITE_OPENWEATHER_API_KEY to your environment.')
  }

  return {
    apiKey,
    geocodingUrl: nonEmpty(env.VITE_OPENWEATHER_GEOCODING_URL) ?? DEFAULT_GEOCODING_URL,
    weatherUrl: nonEmpty(env.VITE_OPENWEATHER_WEATHER_URL) ?? DEFAULT_WEATHER_URL,
  }
}

export const resolveDefaultPlace = (env: ClientEnv = import.meta.env): string =>
  nonEmpty(env.VITE_DEFAULT_PLACE) ?? DEFAULT_PLACE
