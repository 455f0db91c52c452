// Configuracion Vitest del gestor de perfiles.
import { defineConfig } from 'vitest/config';
import { baseVitestConfig } from '../../vitest.base';

export default defineConfig({
  test: {
    ...baseVitestConfig,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      ...baseVitestConfig.coverage,
      // La vista de consola solo hace E/S con readline.
      exclude: [...baseVitestConfig.coverage.exclude, 'src/index.ts', 'src/vista/vistaConsola.ts'],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70
      }
    }
  }
});
