import type { FormEvent } from 'react'
import { AnimatePresence, motion } from 'framer-motion'
import { MapPin, Search, X } from 'lucide-react'
import type { PlaceRecord } from '@/types/weather'
import { formatDisplayLabel, formatQueryKey } from '@/lib/place-record'
import { cn } from '@/lib/utils'

interface LocationSearchProps {
  queryText: string
  suggestions: readonly PlaceRecord[]
  suggestionsVisible: boolean
  onTextChange: (text: string) => void
  onSelect: (record: PlaceRecord) => void
  onSubmit: (text: string) => void
  onClear: () => void
  className?: string
}

export const LocationSearch = ({
  queryText,
  suggestions,
  suggestionsVisible,
  onTextChange,
  onSelect,
  onSubmit,
  onClear,
  className,
}: LocationSearchProps) => {
  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    onSubmit(queryText)
  }

  return (
    <form className={cn('relative', className)} onSubmit={handleSubmit} role="search">
      <label className="sr-only" htmlFor="place-search">
        Search city
      </label>
      <div className="relative">
        <Search className="pointer-events-none absolute inset-y-0 left-3 my-auto h-4 w-4 text-slate-400" aria-hidden />
        <input
          id="place-search"
          type="text"
          autoComplete="off"
          placeholder="Search city (e.g., Davao, Cebu, Baguio)"
          value={queryText}
          onChange={(event) => onTextChange(event.target.value)}
          className="h-11 w-full rounded-xl border border-slate-300 bg-white pl-9 pr-10 text-sm text-slate-900 shadow-sm focus-visible:border-field focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-field/30"
        />
        {queryText ? (
          <button
            type="button"
            onClick={onClear}
            className="absolute inset-y-0 right-2 flex items-center text-slate-400 transition hover:text-slate-600 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400"
            aria-label="Clear search"
          >
            <X className="h-4 w-4" aria-hidden />
          </button>
        ) : null}
      </div>

      <AnimatePresence>
        {suggestionsVisible && suggestions.length > 0 ? (
          <motion.ul
            initial={{ opacity: 0, y: -6 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, y: -6 }}
            transition={{ duration: 0.15 }}
            role="listbox"
            className="absolute left-0 right-0 top-12 z-20 max-h-56 divide-y divide-slate-100 overflow-y-auto rounded-xl border border-slate-200 bg-white shadow-md"
          >
            {suggestions.map((record, index) => (
              <li key={`${formatQueryKey(record)}:${index}`} role="option" aria-selected={false}>
                <button
                  type="button"
                  onClick={() => onSelect(record)}
                  className="flex w-full items-start gap-3 px-4 py-2.5 text-left transition hover:bg-emerald-50 focus-visible:bg-emerald-50 focus-visible:outline-none"
                >
                  <MapPin className="mt-0.5 h-4 w-4 flex-shrink-0 text-field" aria-hidden />
                  <span className="flex flex-col">
                    <span className="text-sm font-medium text-slate-900">{formatDisplayLabel(record)}</span>
                    {record.state ? (
                      <span className="text-xs text-slate-500">{record.state}</span>
                    ) : null}
                  </span>
                </button>
              </li>
            ))}
          </motion.ul>
        ) : null}
      </AnimatePresence>
    </form>
  )
}

export default LocationSearch
