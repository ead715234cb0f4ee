import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{interfaces,services,shared}/**/test/**/*Test.ts'],
    environment: 'node'
  }
});
