import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './App.tsx', './{components,pages,context}/**/*.tsx'],
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
