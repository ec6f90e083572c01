import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts', 'test/**/*.test.tsx'],
    // Installs a silent global `log` before any module under test loads
    setupFiles: ['./test/setup.ts'],
    // sharp and exceljs round-trips are slow on cold CI machines
    testTimeout: 30000,
    // vi.mock factory spies are shared across tests; reset their call history between tests
    clearMocks: true,
  },
})
