import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Logger } from '@nestjs/common';
import { StatusChannelService } from './status-channel.service';

describe('StatusChannelService', () => {
  let dir: string;
  let service: StatusChannelService;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'status-channel-'));
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
    service = new StatusChannelService({
      dir,
      commandsFile: 'voice_commands.json',
      statusFile: 'voice_status.json',
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return null when no status file exists', () => {
    expect(service.read()).toBeNull();
  });

  it('should return null for corrupt content without throwing', () => {
    writeFileSync(service.getPath(), 'not json', 'utf8');

    expect(() => service.read()).not.toThrow();
    expect(service.read()).toBeNull();
  });

  it('should return null for JSON without a status field', () => {
    writeFileSync(service.getPath(), JSON.stringify({ message: 'hello' }), 'utf8');

    expect(service.read()).toBeNull();
  });

  it('should return the parsed status', () => {
    writeFileSync(
      service.getPath(),
      JSON.stringify({
        status: 'recording',
        message: 'Recording General',
        timestamp: '2026-01-01T00:00:00Z',
        guildId: '111',
      }),
      'utf8',
    );

    expect(service.read()).toEqual({
      status: 'recording',
      message: 'Recording General',
      timestamp: '2026-01-01T00:00:00Z',
      guildId: '111',
    });
  });

  it('should not consume the status on read', () => {
    writeFileSync(service.getPath(), JSON.stringify({ status: 'ready', message: '' }), 'utf8');

    service.read();

    expect(service.read()).toEqual({ status: 'ready', message: '' });
  });
});
