import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      SUBTIS_INSTALLER_DIR: join(tmpdir(), 'subtis-installer-vitest'),
    },
  },
});
