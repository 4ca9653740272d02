/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_OPENWEATHER_API_KEY?: string
  readonly VITE_OPENWEATHER_GEOCODING_URL?: string
  readonly VITE_OPENWEATHER_WEATHER_URL?: string
  readonly VITE_DEFAULT_PLACE?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
