import { vi } from 'vitest';
import chalk from 'chalk';

// 時刻の表示をテスト環境に依存させない
process.env.TZ = 'UTC';
process.env.MEETING_BAR_HOME = '/tmp/meeting-bar-test-home';
delete process.env.DEBUG;
delete process.env.MEETING_BAR_REFRESH;
delete process.env.MEETING_BAR_TIMEOUT;
delete process.env.MEETING_BAR_SCOPES;

// 色コードを出さない
chalk.level = 0;

// Suppress console output during tests unless explicitly needed
global.console = {
  ...console,
  log: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
};
