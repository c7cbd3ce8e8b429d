import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));
const pkg = (name: string, entry = 'index.ts') => path.resolve(root, 'packages', name, 'src', entry);

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    sequence: { concurrent: false, shuffle: false },
    coverage: { enabled: false },
    env: { NODE_ENV: 'test' },
  },
  resolve: {
    alias: [
      { find: /^@ticketdesk\/database\/test-utils$/, replacement: pkg('database', 'test-utils/index.ts') },
      { find: /^@ticketdesk\/types$/, replacement: pkg('types') },
      { find: /^@ticketdesk\/core$/, replacement: pkg('core') },
      { find: /^@ticketdesk\/database$/, replacement: pkg('database') },
      { find: /^@ticketdesk\/users$/, replacement: pkg('users') },
      { find: /^@ticketdesk\/projects$/, replacement: pkg('projects') },
      { find: /^@ticketdesk\/teams$/, replacement: pkg('teams') },
      { find: /^@ticketdesk\/tickets$/, replacement: pkg('tickets') },
      { find: /^@ticketdesk\/product-api$/, replacement: pkg('product-api') },
    ],
  },
});
