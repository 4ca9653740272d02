import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

export const cn = (...inputs: ClassValue[]) => twMerge(clsx(inputs))

export const formatCelsius = (value: number | null) =>
  value === null ? '—' : `${value.toFixed(1)}°C`
