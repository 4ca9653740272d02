import { cn } from '@/lib/utils'
import type { HTMLAttributes } from 'react'

export type BadgeVariant = 'default' | 'outline' | 'alert'

export interface BadgeProps extends HTMLAttributes<HTMLSpanElement> {
  variant?: BadgeVariant
}

const variantClasses: Record<BadgeVariant, string> = {
  default: 'bg-emerald-900/85 text-white shadow-sm',
  outline: 'border border-emerald-200 bg-white/70 text-emerald-800 shadow-sm',
  alert: 'border border-rose-200 bg-rose-50 text-rose-700',
}

export const Badge = ({
  className,
  variant = 'default',
  ...props
}: BadgeProps) => (
  <span
    {...props}
    className={cn(
      'inline-flex items-center rounded-full px-2.5 py-0.5 text-xs font-medium uppercase tracking-wide transition',
      variantClasses[variant],
      className,
    )}
  />
)

export default Badge
