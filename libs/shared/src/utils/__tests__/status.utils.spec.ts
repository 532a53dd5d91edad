import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseRecorderStatus, readStatusFile } from '../status.utils';

describe('parseRecorderStatus', () => {
  it('should accept a full status record', () => {
    expect(
      parseRecorderStatus({
        status: 'recording',
        message: 'Recording in General',
        timestamp: '2026-01-01T00:00:00Z',
      }),
    ).toEqual({
      status: 'recording',
      message: 'Recording in General',
      timestamp: '2026-01-01T00:00:00Z',
    });
  });

  it('should keep extra context fields', () => {
    expect(
      parseRecorderStatus({ status: 'ready', message: '', guildId: '111' }),
    ).toEqual({ status: 'ready', message: '', guildId: '111' });
  });

  it('should default a missing message to empty string', () => {
    expect(parseRecorderStatus({ status: 'stopped' })).toEqual({
      status: 'stopped',
      message: '',
    });
  });

  it('should pass through backend-defined states', () => {
    expect(parseRecorderStatus({ status: 'connecting', message: 'wait' })?.status).toBe(
      'connecting',
    );
  });

  it.each([
    ['null', null],
    ['undefined', undefined],
    ['a string', 'ready'],
    ['an array', [{ status: 'ready' }]],
    ['missing status', { message: 'hi' }],
    ['numeric status', { status: 1, message: 'hi' }],
    ['numeric message', { status: 'ready', message: 5 }],
  ])('should return null for %s', (_label, raw) => {
    expect(parseRecorderStatus(raw)).toBeNull();
  });
});

describe('readStatusFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'status-utils-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return null when file is missing', () => {
    expect(readStatusFile(join(dir, 'voice_status.json'))).toBeNull();
  });

  it('should return null when file is not JSON', () => {
    const path = join(dir, 'voice_status.json');
    writeFileSync(path, 'not json', 'utf8');

    expect(readStatusFile(path)).toBeNull();
  });

  it('should return null for a truncated write', () => {
    const path = join(dir, 'voice_status.json');
    writeFileSync(path, '{"status": "recor', 'utf8');

    expect(readStatusFile(path)).toBeNull();
  });

  it('should read a valid status file', () => {
    const path = join(dir, 'voice_status.json');
    writeFileSync(
      path,
      JSON.stringify({ status: 'ready', message: 'Waiting for commands' }),
      'utf8',
    );

    expect(readStatusFile(path)).toEqual({
      status: 'ready',
      message: 'Waiting for commands',
    });
  });
});
