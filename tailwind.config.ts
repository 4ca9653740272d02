import { fontFamily } from 'tailwindcss/defaultTheme'
import animate from 'tailwindcss-animate'
import type { Config } from 'tailwindcss'

const config: Config = {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      fontFamily: {
        sans: ['Inter', ...fontFamily.sans],
      },
      colors: {
        field: {
          DEFAULT: '#1B5E20',
          card: '#E6F4EA',
        },
      },
    },
  },
  plugins: [animate],
}

export default config
