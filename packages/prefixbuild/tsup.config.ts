import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { cli: 'src/cli.ts' },
  format: ['esm'],
  clean: true,
  platform: 'node',
  target: 'node20',
  // The shared workspace ships TypeScript sources; inline it
  noExternal: ['@prefixbuild/shared'],
});
