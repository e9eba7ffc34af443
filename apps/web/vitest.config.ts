import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'jsdom',
    setupFiles: ['./test/setup.ts'],
    include: ['test/**/*.test.tsx'],
    env: {
      NEXT_PUBLIC_API_BASE_URL: 'http://api.test'
    },
    css: true,
    clearMocks: true
  }
});
