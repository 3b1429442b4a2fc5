import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  target: 'node20',
  external: [
    'playwright',
    'playwright-extra',
    'puppeteer-extra-plugin-stealth',
    'sharp',
  ],
});
