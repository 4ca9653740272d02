export const DEFAULT_DEBOUNCE_MS = 350

export type DebouncerState =
  | { status: 'idle' }
  | { status: 'pending'; deadline: number; text: string }

export interface DebouncerOptions {
  wait?: number
  onFire: (text: string) => void
  onClear: () => void
}

export interface Debouncer {
  notify: (text: string) => void
  cancel: () => void
  getState: () => DebouncerState
}

export const createDebouncer = ({
  wait = DEFAULT_DEBOUNCE_MS,
  onFire,
  onClear,
}: DebouncerOptions): Debouncer => {
  let timeoutId: ReturnType<typeof setTimeout> | undefined
  let state: DebouncerState = { status: 'idle' }

  const cancel = () => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId)
      timeoutId = undefined
    }
    state = { status: 'idle' }
  }

  const notify = (text: string) => {
    cancel()
    if (!text.trim()) {
      onClear()
      return
    }

    state = { status: 'pending', deadline: Date.now() + wait, text }
    timeoutId = setTimeout(() => {
      timeoutId = undefined
      state = { status: 'idle' }
      onFire(text)
    }, wait)
  }

  return {
    notify,
    cancel,
    getState: () => state,
  }
}
