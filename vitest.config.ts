import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    // No settle or inter-command pauses against mock transports
    env: {
      LABDEV_SETTLE_MS: '0',
      LABDEV_COMMAND_DELAY_MS: '0',
      LABDEV_DUMMY_LOG: '0',
    },
  },
});
