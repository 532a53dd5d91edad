import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Required - Discord
  DISCORD_TOKEN: Joi.string().required().messages({
    'any.required':
      'DISCORD_TOKEN is required. Get it from https://discord.com/developers/applications',
  }),
  TARGET_USER_ID: Joi.string().pattern(/^\d+$/).required().messages({
    'any.required':
      'TARGET_USER_ID is required. Enable Developer Mode in Discord and copy the user ID.',
    'string.pattern.base': 'TARGET_USER_ID must be a numeric Discord user ID',
  }),

  // Optional - Discord
  COMMAND_PREFIX: Joi.string().max(5).default('!'),

  // Optional - IPC files shared with the recorder process
  IPC_DIR: Joi.string().optional().default('.'),
  COMMANDS_FILE: Joi.string().optional().default('voice_commands.json'),
  STATUS_FILE: Joi.string().optional().default('voice_status.json'),

  // Optional - Orchestrator timing
  START_CONFIRM_DELAY_MS: Joi.number().integer().min(0).max(60000).default(2000),
  STOP_CONFIRM_DELAY_MS: Joi.number().integer().min(0).max(60000).default(5000),
  MOVE_GAP_MS: Joi.number().integer().min(0).max(60000).default(1000),
  TEST_RECORDING_MS: Joi.number().integer().min(1000).max(300000).default(5000),

  // Optional - Maintenance
  MAINTENANCE_INTERVAL_MS: Joi.number().integer().min(10000).default(600000),
  SESSION_MAX_AGE_MS: Joi.number().integer().min(60000).default(86400000),

  // Optional - Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
  BACKGROUND_MODE: Joi.string().valid('true', 'false').default('false'),
}).options({ allowUnknown: true });
