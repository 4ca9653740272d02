import { CloudSun, Loader2, RefreshCw } from 'lucide-react'
import type { PrimaryState } from '@/types/weather'
import { Badge } from '@/components/ui/badge'
import { cn, formatCelsius } from '@/lib/utils'

interface WeatherCardProps {
  primaryKey: string
  primaryState: PrimaryState
  onRefresh: () => void
  className?: string
}

const RefreshButton = ({ onRefresh, label }: { onRefresh: () => void; label: string }) => (
  <button
    type="button"
    onClick={onRefresh}
    className="mt-3 inline-flex items-center gap-2 rounded-full border border-emerald-200 bg-white/80 px-3 py-1 text-xs font-semibold uppercase tracking-wide text-emerald-900 transition hover:border-emerald-400"
  >
    <RefreshCw className="h-3.5 w-3.5" aria-hidden />
    {label}
  </button>
)

export const WeatherCard = ({ primaryKey, primaryState, onRefresh, className }: WeatherCardProps) => (
  <section
    aria-live="polite"
    className={cn(
      'rounded-3xl bg-field-card p-5 shadow-[0_18px_45px_-32px_rgba(15,23,42,0.35)]',
      className,
    )}
  >
    <div className="mb-3 flex items-center justify-between gap-3">
      <h2 className="flex items-center gap-2 text-lg font-bold text-slate-900">
        <CloudSun className="h-5 w-5 text-field" aria-hidden />
        {`Weather in ${primaryKey}`}
      </h2>
      {primaryState.status === 'failed' ? <Badge variant="alert">Offline</Badge> : null}
    </div>

    {primaryState.status === 'loading' ? (
      <div className="flex items-center gap-2 py-3 text-sm text-slate-600">
        <Loader2 className="h-4 w-4 animate-spin" aria-hidden />
        Fetching the latest conditions…
      </div>
    ) : primaryState.status === 'failed' ? (
      <div className="text-sm">
        <p className="text-rose-700">{primaryState.message}</p>
        <RefreshButton onRefresh={onRefresh} label="Try again" />
      </div>
    ) : (
      <div>
        <dl className="space-y-1 text-[15px] text-slate-800">
          <div className="flex gap-1">
            <dt>Temperature:</dt>
            <dd>{formatCelsius(primaryState.reading.temperature)}</dd>
          </div>
          <div className="flex gap-1">
            <dt>Humidity:</dt>
            <dd>{`${primaryState.reading.humidity ?? 0}%`}</dd>
          </div>
          <div className="flex gap-1">
            <dt>Condition:</dt>
            <dd>{primaryState.reading.description}</dd>
          </div>
        </dl>
        <RefreshButton onRefresh={onRefresh} label="Refresh" />
      </div>
    )}
  </section>
)

export default WeatherCard
