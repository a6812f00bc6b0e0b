import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  splitting: false,
  sourcemap: false,
  treeshake: true,
  banner: {
    // createRequire for bundled CommonJS dependencies that call require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },

  // Workspace packages ship TypeScript sources, so they go into the bundle
  noExternal: ['@projpick/shared', '@projpick/scanner', '@projpick/exec'],
});
