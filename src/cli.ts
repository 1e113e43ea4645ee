import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { runWidget } from './commands/widget.js';
import { runWaybar } from './commands/waybar.js';
import { showTooltip } from './commands/tooltip.js';
import { runClick } from './commands/click.js';
import { debugCalendar } from './commands/debug.js';
import { doctor } from './commands/doctor.js';
import { login } from './commands/auth/login.js';
import { logout } from './commands/auth/logout.js';
import { runReauth } from './commands/auth/reauth.js';

// Get package.json version dynamically（src/ からでも dist/src/ からでも読めるように）
function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    }
  }
  return '0.0.0';
}

export function parseSeconds(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number of seconds.');
  }
  return parsed;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('meeting-bar')
    .description('Status bar widget for your next Microsoft 365 meeting')
    .version(readVersion())
    .option('--debug', 'Enable debug output (written to stderr)')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts().debug) {
        process.env.DEBUG = '1';
      }
    });

  // 引数なしの場合はウィジェットを起動
  program.action(() => runWidget());

  // ターミナルウィジェット
  program
    .command('widget')
    .description('Run the interactive terminal widget')
    .option('-r, --refresh <seconds>', 'Refresh interval in seconds', parseSeconds)
    .option('-c, --compact', 'Use compact display mode')
    .action((options: { refresh?: number; compact?: boolean }) => runWidget(options));

  // Waybar 用 JSON 出力
  program
    .command('waybar')
    .description('Print one line of Waybar JSON and exit')
    .option('--force-refresh', 'Force a new login on this run')
    .action((options: { forceRefresh?: boolean }) => runWaybar(options));

  // ツールチップ
  program
    .command('tooltip')
    .description('Show today\'s schedule and upcoming events')
    .action(() => showTooltip());

  // クリック処理
  program
    .command('click')
    .description('Open the current meeting, or re-authenticate when needed')
    .action(() => runClick());

  // 認証コマンド
  program
    .command('login')
    .alias('setup')
    .description('Login to Microsoft Graph (automatically opens browser)')
    .option('--scopes <scopes>', 'Custom scopes (default: Calendars.Read User.Read)')
    .action((options: { scopes?: string }) => login(options));

  program
    .command('reauth')
    .description('Clear the session and login again')
    .action(() => runReauth());

  program
    .command('logout')
    .description('Logout from Microsoft Graph')
    .option('-a, --all', 'Also delete local settings')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action((options: { all?: boolean; yes?: boolean }) => logout(options));

  // Doctorコマンド
  program
    .command('doctor')
    .description('Check your environment setup')
    .action(() => doctor());

  program
    .command('debug')
    .description('Show fetched events with their status and the selected meeting')
    .action(() => debugCalendar());

  return program;
}
