import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      fontFamily: {
        sans: ['"Space Grotesk"', '"Avenir Next"', 'system-ui', 'sans-serif']
      },
      colors: {
        'sweeper-blue': '#0062ad',
        'sweeper-paper': '#f2ead7',
        'sweeper-ink': '#121212'
      },
      boxShadow: {
        block: '8px 8px 0 #121212'
      }
    }
  },
  plugins: []
} satisfies Config;
