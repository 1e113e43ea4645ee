import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import { ConfigError } from '../types/errors.js';
import { getConfigPath, getDataDir, loadConfig } from './config.js';

vi.mock('fs/promises');

const missingFile = () => Object.assign(new Error('missing'), { code: 'ENOENT' });

describe('config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    delete process.env.MEETING_BAR_REFRESH;
    delete process.env.MEETING_BAR_TIMEOUT;
    delete process.env.MEETING_BAR_SCOPES;
  });

  it('should resolve paths under MEETING_BAR_HOME', () => {
    expect(getDataDir()).toBe('/tmp/meeting-bar-test-home');
    expect(getConfigPath()).toBe('/tmp/meeting-bar-test-home/config.json');
  });

  it('should use defaults when the file is missing', async () => {
    vi.mocked(fs.readFile).mockRejectedValue(missingFile());

    await expect(loadConfig('/tmp/config.json')).resolves.toEqual({
      refreshInterval: 60,
      requestTimeoutSeconds: 30,
      compact: false,
      scopes: 'Calendars.Read User.Read',
      upcomingDays: 7,
      maxUpcomingInTooltip: 5
    });
  });

  it('should read values from the file', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ refreshInterval: 30, compact: true }));

    const config = await loadConfig('/tmp/config.json');
    expect(config.refreshInterval).toBe(30);
    expect(config.compact).toBe(true);
  });

  it('should let environment variables win over the file', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ refreshInterval: 30 }));
    process.env.MEETING_BAR_REFRESH = '15';
    process.env.MEETING_BAR_TIMEOUT = '5';
    process.env.MEETING_BAR_SCOPES = 'Calendars.Read';

    const config = await loadConfig('/tmp/config.json');
    expect(config.refreshInterval).toBe(15);
    expect(config.requestTimeoutSeconds).toBe(5);
    expect(config.scopes).toBe('Calendars.Read');
  });

  it('should reject a non-numeric environment value', async () => {
    vi.mocked(fs.readFile).mockRejectedValue(missingFile());
    process.env.MEETING_BAR_REFRESH = 'often';

    await expect(loadConfig('/tmp/config.json')).rejects.toThrow('MEETING_BAR_REFRESH must be a number (got "often")');
  });

  it('should reject invalid values', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ refreshInterval: 0 }));

    await expect(loadConfig('/tmp/config.json')).rejects.toThrow(ConfigError);
  });

  it('should reject malformed JSON', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('{ nope');

    await expect(loadConfig('/tmp/config.json')).rejects.toThrow('Config file /tmp/config.json is not valid JSON');
  });
});
