import { spawn } from 'child_process';
import chalk from 'chalk';
import { ClickTarget } from '../types/calendar.js';
import { getErrorMessage } from '../types/errors.js';

export type ProcessLauncher = (command: string, args: string[]) => Promise<number | null>;

const defaultLauncher: ProcessLauncher = (command, args) => {
  const child = spawn(command, args, { stdio: 'ignore' });
  return new Promise<number | null>((resolve, reject) => {
    child.on('close', code => resolve(code));
    child.on('error', err => reject(err));
  });
};

/**
 * OS ごとの「既定のアプリで開く」コマンド
 */
export function getOpenCommand(url: string, platform: NodeJS.Platform = process.platform): { command: string; args: string[] } | null {
  switch (platform) {
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return { command: 'xdg-open', args: [url] };
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      return null;
  }
}

export class LinkOpener {
  constructor(
    private readonly launch: ProcessLauncher = defaultLauncher,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  /**
   * リンクを開く。失敗してもログに出すだけで例外にはしない
   * Teams の場合はまずアプリ（msteams:）を試し、だめならブラウザで開く
   */
  async open(target: ClickTarget): Promise<boolean> {
    if (target.kind === 'teams') {
      if (await this.openUrl(target.appUrl)) {
        return true;
      }
      if (process.env.DEBUG) {
        console.error(chalk.gray('Teams app not available, falling back to browser'));
      }
    }
    return this.openUrl(target.url);
  }

  async openUrl(url: string): Promise<boolean> {
    const openCommand = getOpenCommand(url, this.platform);
    if (!openCommand) {
      console.error(chalk.yellow(`Opening links is not supported on ${this.platform}`));
      return false;
    }

    try {
      const code = await this.launch(openCommand.command, openCommand.args);
      if (code !== 0) {
        console.error(chalk.yellow(`${openCommand.command} exited with code ${code} for ${url}`));
        return false;
      }
      return true;
    } catch (error) {
      console.error(chalk.yellow(`Failed to open ${url}: ${getErrorMessage(error)}`));
      return false;
    }
  }
}
