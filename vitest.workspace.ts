import { defineWorkspace } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

// Workspace packages resolve to their sources, so tests need no build
const alias = [
  { find: /^hearthjs-shared$/, replacement: resolve(root, 'packages/shared/src/index.ts') },
  { find: /^hearthjs-core$/, replacement: resolve(root, 'packages/core/src/index.ts') },
  { find: /^hearthjs-core\/runtime$/, replacement: resolve(root, 'packages/core/src/runtime.ts') },
  { find: /^hearthjs-adapter-react$/, replacement: resolve(root, 'packages/adapter-react/src/index.ts') },
  { find: /^hearthjs-adapter-react\/client$/, replacement: resolve(root, 'packages/adapter-react/src/client.ts') },
];

const jsx = {
  jsx: 'automatic',
  jsxImportSource: 'react',
} as const;

export default defineWorkspace([
  {
    test: {
      name: 'shared',
      environment: 'node',
      root: resolve(root, 'packages/shared'),
      include: ['src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'core',
      environment: 'node',
      root: resolve(root, 'packages/core'),
      include: ['src/__tests__/**/*.test.ts'],
    },
    resolve: { alias },
  },
  {
    test: {
      name: 'adapter-react',
      environment: 'node',
      root: resolve(root, 'packages/adapter-react'),
      include: ['src/__tests__/**/*.test.{ts,tsx}'],
    },
    resolve: { alias },
    esbuild: jsx,
  },
  {
    test: {
      name: 'cli',
      environment: 'node',
      root: resolve(root, 'packages/cli'),
      include: ['src/__tests__/**/*.test.ts'],
    },
    resolve: { alias },
  },
  {
    test: {
      name: 'news',
      environment: 'node',
      root: resolve(root, 'examples/news'),
      include: ['src/__tests__/**/*.test.{ts,tsx}'],
    },
    resolve: { alias },
    esbuild: jsx,
  },
]);
