import type { Config } from 'tailwindcss';
import colors from 'tailwindcss/colors';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        surface: colors.slate,
        accent: colors.indigo,
        danger: colors.red[600],
      },
    },
  },
  plugins: [],
} satisfies Config;
