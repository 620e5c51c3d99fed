import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/server.ts', 'src/infra/database/migrations/runMigrations.ts'],
  format: ['esm'],
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  splitting: false,
  dts: false,
  bundle: true
});
