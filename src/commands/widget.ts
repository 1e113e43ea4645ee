import chalk from 'chalk';
import { CalendarService, CalendarSnapshot, createServices } from '../services/calendar.js';
import { LinkOpener } from '../services/opener.js';
import { getErrorMessage, isAuthRequired, isRetryableError } from '../types/errors.js';
import { loadConfig } from '../utils/config.js';
import { formatClock } from '../utils/date.js';
import { renderTerminalLine } from '../utils/format.js';
import { resolveClickTarget } from '../utils/selector.js';
import { StatusTheme, loadTheme } from '../utils/theme.js';

export interface WidgetOptions {
  refreshInterval: number;
  compact: boolean;
}

export interface KeyPress {
  name?: string;
  ctrl?: boolean;
}

export type TerminalInput =
  | { kind: 'key'; key: KeyPress }
  | { kind: 'mouse'; button: number; x: number; y: number };

const ESC = 0x1b;
// X10 形式のマウス報告（ESC [ M Cb Cx Cy）を有効・無効にする
const MOUSE_ON = '\x1B[?1000h';
const MOUSE_OFF = '\x1B[?1000l';
export const LEFT_BUTTON = 0;

/**
 * raw モードの入力をキーとマウスイベントに分解する
 * 未知のエスケープシーケンスは読み飛ばす
 */
export function parseTerminalInput(data: Buffer): TerminalInput[] {
  const inputs: TerminalInput[] = [];
  let i = 0;
  while (i < data.length) {
    const byte = data[i];
    if (byte === ESC && data[i + 1] === 0x5b) {
      if (data[i + 2] === 0x4d && i + 5 < data.length) {
        const cb = data[i + 3] - 32;
        // 上位ビットはホイール・ドラッグ
        if ((cb & 0x60) === 0) {
          inputs.push({ kind: 'mouse', button: cb & 0x03, x: data[i + 4] - 32, y: data[i + 5] - 32 });
        }
        i += 6;
        continue;
      }
      let end = i + 2;
      while (end < data.length && (data[end] < 0x40 || data[end] > 0x7e)) {
        end++;
      }
      i = end + 1;
      continue;
    }
    if (byte === ESC) {
      inputs.push({ kind: 'key', key: { name: 'escape' } });
    } else if (byte === 0x03) {
      inputs.push({ kind: 'key', key: { name: 'c', ctrl: true } });
    } else if (byte === 0x0d || byte === 0x0a) {
      inputs.push({ kind: 'key', key: { name: 'return' } });
    } else if (byte === 0x20) {
      inputs.push({ kind: 'key', key: { name: 'space' } });
    } else if (byte > 0x20 && byte < 0x7f) {
      inputs.push({ kind: 'key', key: { name: String.fromCharCode(byte).toLowerCase() } });
    }
    i++;
  }
  return inputs;
}

/**
 * ターミナル上で次の会議を表示し続けるウィジェット
 * タイマーまたはキー入力で再描画する
 */
export class TerminalWidget {
  private snapshot: CalendarSnapshot | null = null;
  private lastError: unknown = null;
  private notice: string | null = null;
  private refreshing = false;
  private timer: NodeJS.Timeout | null = null;
  private stopResolver: (() => void) | null = null;
  private readonly onData = (data: Buffer) => {
    for (const input of parseTerminalInput(data)) {
      const handled = input.kind === 'key' ? this.handleKey(input.key) : this.handleMouse(input.button);
      handled.catch(error => {
        this.notice = getErrorMessage(error);
        this.draw();
      });
    }
  };

  constructor(
    private readonly calendar: CalendarService,
    private readonly opener: LinkOpener,
    private readonly theme: StatusTheme,
    private readonly options: WidgetOptions,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  /**
   * 予定を取り直す。失敗してもループは止めず、エラーを表示する
   * ブラウザログインは端末を奪うので行わない（認証切れは login コマンドへ誘導）
   */
  async refresh(): Promise<void> {
    if (this.refreshing) {
      return;
    }
    this.refreshing = true;
    try {
      this.snapshot = await this.calendar.fetchSnapshot({ allowInteractive: false });
      this.lastError = null;
    } catch (error) {
      this.lastError = error;
    } finally {
      this.refreshing = false;
    }
    this.draw();
  }

  render(now: Date = new Date()): string {
    const lines: string[] = [];
    // 一時的な失敗なら前回の表示を残す
    const keepPrevious = this.snapshot !== null && isRetryableError(this.lastError);

    if (this.lastError && isAuthRequired(this.lastError)) {
      lines.push(chalk.red.bold('Not signed in. Run: meeting-bar login'));
    } else if (this.lastError && !keepPrevious) {
      lines.push(chalk.red.bold(`Error: ${getErrorMessage(this.lastError)}`));
    } else if (!this.snapshot) {
      lines.push(chalk.gray('Loading...'));
    } else if (!this.snapshot.selected) {
      lines.push(chalk.gray.italic('No upcoming meetings'));
    } else {
      lines.push(renderTerminalLine(this.snapshot.selected, now, this.theme, this.options.compact));
    }

    if (keepPrevious) {
      lines.push(chalk.yellow(`Refresh failed: ${getErrorMessage(this.lastError)}`));
    }
    if (this.notice) {
      lines.push(chalk.yellow(this.notice));
    }

    const updated = this.snapshot ? `Updated ${formatClock(this.snapshot.fetchedAt)}  ` : '';
    lines.push(chalk.gray(`${updated}[enter] join  [r] refresh  [q] quit`));
    return lines.join('\n');
  }

  async openSelected(): Promise<void> {
    const target = resolveClickTarget(this.snapshot?.selected ?? null, new Date());
    if (!target) {
      this.notice = 'No meeting to join right now';
    } else {
      this.notice = await this.opener.open(target) ? null : 'Could not open the meeting link';
    }
    this.draw();
  }

  async handleKey(key: KeyPress): Promise<void> {
    if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
      this.stop();
      return;
    }
    if (key.name === 'return' || key.name === 'enter' || key.name === 'space') {
      await this.openSelected();
      return;
    }
    if (key.name === 'r') {
      await this.refresh();
    }
  }

  // 左クリックで会議を開く
  async handleMouse(button: number): Promise<void> {
    if (button === LEFT_BUTTON) {
      await this.openSelected();
    }
  }

  /**
   * ループを開始し、q が押されるまで待つ
   */
  async start(input: NodeJS.ReadStream = process.stdin): Promise<void> {
    if (input.isTTY) {
      input.setRawMode(true);
    }
    input.on('data', this.onData);
    input.resume();
    this.output.write(MOUSE_ON);

    const stopped = new Promise<void>(resolve => {
      this.stopResolver = () => {
        input.off('data', this.onData);
        this.output.write(MOUSE_OFF);
        if (input.isTTY) {
          input.setRawMode(false);
        }
        input.pause();
        resolve();
      };
    });

    await this.refresh();
    this.timer = setInterval(() => {
      this.refresh().catch(error => {
        this.lastError = error;
      });
    }, this.options.refreshInterval * 1000);

    await stopped;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.stopResolver) {
      this.stopResolver();
      this.stopResolver = null;
    }
  }

  private draw(): void {
    // 画面をクリアしてから描画
    this.output.write('\x1B[2J\x1B[H' + this.render() + '\n');
  }
}

export async function runWidget(options: { refresh?: number; compact?: boolean } = {}): Promise<void> {
  try {
    const config = await loadConfig();
    const theme = await loadTheme();
    const { calendar } = createServices(config);

    const refreshInterval = options.refresh ?? config.refreshInterval;
    if (!Number.isInteger(refreshInterval) || refreshInterval <= 0) {
      throw new Error(`Invalid refresh interval: ${refreshInterval}`);
    }

    const widget = new TerminalWidget(calendar, new LinkOpener(), theme, {
      refreshInterval,
      compact: options.compact ?? config.compact,
    });
    await widget.start();
  } catch (error) {
    console.error(chalk.red('Widget failed:'), getErrorMessage(error));
    process.exit(1);
  }
}
