/**
 * Runtime configuration
 *
 * Environment variables (all optional):
 *   LABDEV_TIMEOUT_MS        - Query timeout for every transport (default: 2000)
 *   LABDEV_COMMAND_DELAY_MS  - Pause after each serial command (default: 50)
 *   LABDEV_SETTLE_MS         - Pause after opening a link, before the first command (default: 500)
 *   LABDEV_DUMMY_LOG         - Set to 0 to silence dummy connect/close messages (default: 1)
 */

export interface LabDevicesConfig {
  timeoutMs: number;
  commandDelayMs: number;
  settleMs: number;
  dummyLogging: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LabDevicesConfig {
  const parseMs = (value: string | undefined, defaultVal: number): number => {
    if (!value) return defaultVal;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) || parsed < 0 ? defaultVal : parsed;
  };

  return {
    timeoutMs: parseMs(env.LABDEV_TIMEOUT_MS, 2000),
    commandDelayMs: parseMs(env.LABDEV_COMMAND_DELAY_MS, 50),
    settleMs: parseMs(env.LABDEV_SETTLE_MS, 500),
    dummyLogging: env.LABDEV_DUMMY_LOG !== '0',
  };
}

export const config: LabDevicesConfig = loadConfig();
