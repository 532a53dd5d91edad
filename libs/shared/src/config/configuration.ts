import { registerAs } from '@nestjs/config';

function envInt(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const discordConfig = registerAs('discord', () => ({
  token: process.env.DISCORD_TOKEN,
  targetUserId: process.env.TARGET_USER_ID ?? '',
  commandPrefix: process.env.COMMAND_PREFIX || '!',
}));

export const ipcConfig = registerAs('ipc', () => ({
  dir: process.env.IPC_DIR || '.',
  commandsFile: process.env.COMMANDS_FILE || 'voice_commands.json',
  statusFile: process.env.STATUS_FILE || 'voice_status.json',
}));

export const orchestratorConfig = registerAs('orchestrator', () => ({
  startConfirmDelayMs: envInt(process.env.START_CONFIRM_DELAY_MS, 2000),
  // Disconnect takes longer on the recorder side than connect
  stopConfirmDelayMs: envInt(process.env.STOP_CONFIRM_DELAY_MS, 5000),
  moveGapMs: envInt(process.env.MOVE_GAP_MS, 1000),
  testRecordingMs: envInt(process.env.TEST_RECORDING_MS, 5000),
}));

export const maintenanceConfig = registerAs('maintenance', () => ({
  intervalMs: envInt(process.env.MAINTENANCE_INTERVAL_MS, 600000),
  sessionMaxAgeMs: envInt(process.env.SESSION_MAX_AGE_MS, 86400000),
}));

export const loggingConfig = registerAs('logging', () => ({
  level: process.env.LOG_LEVEL || 'info',
  backgroundMode: process.env.BACKGROUND_MODE === 'true',
}));
