import type { Config } from 'tailwindcss';
import { palette } from './src/modules/palette';

export default {
  content: [
    './index.html',
    './src/**/*.{ts,tsx}'
  ],
  theme: {
    extend: {
      colors: palette
    }
  },
  plugins: []
} satisfies Config;
