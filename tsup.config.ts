import { defineConfig, type Options } from 'tsup';

// Workspace packages export TypeScript sources, so they are bundled rather than imported at runtime
const WORKSPACE_PACKAGES = [/^@gpgpipe\//];

export const buildTargets: Options[] = [
  // ESM build for library usage
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    sourcemap: true,
    dts: true,
    splitting: false,
    noExternal: WORKSPACE_PACKAGES,
  },
  // CLI build; the hashbang in src/cli.ts is kept
  {
    entry: ['src/cli.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: false,
    sourcemap: true,
    dts: false,
    splitting: false,
    bundle: true,
    noExternal: WORKSPACE_PACKAGES,
  },
];

export default defineConfig(buildTargets);
