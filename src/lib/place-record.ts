import type { PlaceRecord } from '@/types/weather'
import { MalformedRecordError } from '@/lib/errors'

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const readString = (source: Record<string, unknown>, field: string): string | undefined => {
  const value = source[field]
  return typeof value === 'string' ? value : undefined
}

export const parsePlaceRecord = (raw: unknown): PlaceRecord => {
  if (!isRecord(raw)) {
    throw new MalformedRecordError()
  }

  const state = readString(raw, 'state')
  const record: PlaceRecord = state === undefined
    ? { name: readString(raw, 'name') ?? '', country: readString(raw, 'country') ?? '' }
    : { name: readString(raw, 'name') ?? '', state, country: readString(raw, 'country') ?? '' }

  return Object.freeze(record)
}

/**
 * Parses a geocoding response body. Entries that are not objects are skipped so
 * one bad row does not empty the whole suggestion list.
 */
export const parsePlaceRecords = (body: unknown): PlaceRecord[] => {
  if (!Array.isArray(body)) {
    throw new MalformedRecordError('Geocoding response is not a list.')
  }

  const records: PlaceRecord[] = []
  body.forEach((entry: unknown, index) => {
    try {
      records.push(parsePlaceRecord(entry))
    } catch (error) {
      if (import.meta.env.DEV) {
        console.warn(`Skipping geocoding entry #${index}:`, error)
      }
    }
  })
  return records
}

const labelParts = (record: PlaceRecord) => (record.state
  ? [record.name, record.state, record.country]
  : [record.name, record.country])

export const formatDisplayLabel = (record: PlaceRecord): string => labelParts(record).join(', ')

export const formatQueryKey = (record: PlaceRecord): string => labelParts(record).join(',')

export const isSamePlace = (a: PlaceRecord, b: PlaceRecord): boolean =>
  a.name === b.name
  && (a.state ?? '') === (b.state ?? '')
  && a.country === b.country
