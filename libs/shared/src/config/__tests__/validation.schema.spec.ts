import { validationSchema } from '../validation.schema';

describe('validationSchema', () => {
  const base = { DISCORD_TOKEN: 'test-token', TARGET_USER_ID: '123456789012345678' };

  it('should apply defaults for optional values', () => {
    const { error, value } = validationSchema.validate(base);

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      COMMAND_PREFIX: '!',
      IPC_DIR: '.',
      COMMANDS_FILE: 'voice_commands.json',
      STATUS_FILE: 'voice_status.json',
      START_CONFIRM_DELAY_MS: 2000,
      STOP_CONFIRM_DELAY_MS: 5000,
      MOVE_GAP_MS: 1000,
      LOG_LEVEL: 'info',
      BACKGROUND_MODE: 'false',
    });
  });

  it('should report every missing required value', () => {
    const { error } = validationSchema.validate({}, { abortEarly: false });

    expect(error?.details.map((d) => d.path[0])).toEqual([
      'DISCORD_TOKEN',
      'TARGET_USER_ID',
    ]);
  });

  it('should reject a non-numeric TARGET_USER_ID', () => {
    const { error } = validationSchema.validate({ ...base, TARGET_USER_ID: 'abc' });

    expect(error?.message).toBe('TARGET_USER_ID must be a numeric Discord user ID');
  });

  it('should coerce numeric strings', () => {
    const { value } = validationSchema.validate({ ...base, MOVE_GAP_MS: '250' });

    expect(value.MOVE_GAP_MS).toBe(250);
  });

  it('should allow unknown variables', () => {
    const { error } = validationSchema.validate({ ...base, PATH: '/usr/bin' });

    expect(error).toBeUndefined();
  });
});
