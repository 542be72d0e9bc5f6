import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
      include: ['tests/**/*.test.ts'],
      forceRerunTriggers : [
        './tests/*.yaml',
        './tests/greek-letters.toml',
        './src/data/*.json',
      ],
    }
  });
