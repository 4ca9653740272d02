export interface GeocodingEntry {
  name?: string
  state?: string
  country?: string
  lat?: number
  lon?: number
}

export interface PlaceRecord {
  readonly name: string
  readonly state?: string
  readonly country: string
}

export interface CurrentWeatherResponse {
  name?: string
  main?: {
    temp?: number
    feels_like?: number
    humidity?: number
  }
  weather?: {
    id?: number
    main?: string
    description?: string
    icon?: string
  }[]
}

export interface WeatherReading {
  locationName: string
  temperature: number | null
  humidity: number | null
  description: string
}

export type PrimaryState =
  | { status: 'loading' }
  | { status: 'ready'; reading: WeatherReading }
  | { status: 'failed'; message: string }

export interface SearchState {
  queryText: string
  suggestions: readonly PlaceRecord[]
  suggestionsVisible: boolean
  requestEpoch: number
  primaryKey: string
  primaryState: PrimaryState
}

export interface OpenWeatherConfig {
  apiKey: string
  geocodingUrl: string
  weatherUrl: string
}
