// Copyright 2013 Stephen Vickers <stephen.vickers.sv@gmail.com>

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/*.test.ts'],
    environment: 'node',
  },
});
