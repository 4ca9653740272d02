import { motion } from 'framer-motion'
import { Sprout } from 'lucide-react'
import LocationSearch from '@/components/search/LocationSearch'
import WeatherCard from '@/components/weather/WeatherCard'
import { useLocationSearch } from '@/hooks/useLocationSearch'

function App() {
  const { state, actions } = useLocationSearch()

  return (
    <div className="relative min-h-screen bg-slate-50">
      <div className="mx-auto flex w-full max-w-xl flex-col gap-6 px-4 py-10">
        <header className="flex items-center gap-2">
          <Sprout className="h-6 w-6 text-field" aria-hidden />
          <h1 className="text-xl font-semibold text-slate-900">Field weather</h1>
        </header>

        <LocationSearch
          queryText={state.queryText}
          suggestions={state.suggestions}
          suggestionsVisible={state.suggestionsVisible}
          onTextChange={actions.changeText}
          onSelect={actions.selectSuggestion}
          onSubmit={actions.submit}
          onClear={actions.clear}
        />

        <motion.div
          initial={{ opacity: 0, y: 24 }}
          animate={{ opacity: 1, y: 0 }}
          transition={{ type: 'spring', stiffness: 120, damping: 18 }}
        >
          <WeatherCard
            primaryKey={state.primaryKey}
            primaryState={state.primaryState}
            onRefresh={actions.refresh}
          />
        </motion.div>
      </div>
    </div>
  )
}

export default App
