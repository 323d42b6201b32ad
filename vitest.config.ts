/// <reference types="vitest" />
import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    globals: true,
    environment: 'node',
    environmentMatchGlobs: [['miniapp/**', 'jsdom']],
    include: ['{src,shared,miniapp}/**/*.test.{ts,tsx}'],
  },
});
