import { exec, spawn } from 'child_process';
import { promisify } from 'util';
import chalk from 'chalk';
import { CalendarEvent } from '../types/calendar.js';
import { AuthRequiredError, GraphApiError, TransientFetchError, isAuthRequired } from '../types/errors.js';
import { CalendarViewResponseSchema, toCalendarEvents } from '../utils/events.js';
import { getTodayRange, getUpcomingRange, toGraphDateTime } from '../utils/date.js';

const execAsync = promisify(exec);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, options: { timeout: number; maxBuffer: number }) => Promise<CommandOutput>;

export type InteractiveRunner = (command: string, args: string[], options: { stdoutToStderr: boolean }) => Promise<number | null>;

export interface MgcServiceOptions {
  timeoutMs?: number;
  run?: CommandRunner;
  runInteractive?: InteractiveRunner;
}

// Graph が認証切れを返すときのエラーコード
const AUTH_ERROR_CODES = new Set(['InvalidAuthenticationToken', 'Unauthorized', 'AuthenticationError']);

// mgc がセッション未作成・期限切れのときに stderr に出す文言
const NO_SESSION_PATTERN = /not (?:logged|signed) in|no (?:valid )?(?:account|session|token)|authentication (?:is )?(?:required|needed)|AuthenticationRequired|run ['"]?mgc login/i;

const EVENT_FIELDS = [
  'id', 'subject', 'start', 'end', 'location', 'webLink', 'body', 'organizer', 'attendees',
  'isOnlineMeeting', 'onlineMeeting', 'isAllDay', 'showAs', 'isCancelled',
].join(',');

const defaultRunner: CommandRunner = (command, options) => execAsync(command, options);

// mgc login/logout はブラウザやプロンプトを使うので標準入出力を継承する
const defaultInteractiveRunner: InteractiveRunner = (command, args, { stdoutToStderr }) => {
  const child = spawn(command, args, {
    stdio: stdoutToStderr ? ['inherit', process.stderr, 'inherit'] : 'inherit',
  });

  return new Promise<number | null>((resolve, reject) => {
    child.on('close', code => resolve(code));
    child.on('error', err => reject(err));
  });
};

interface ExecFailure {
  message: string;
  killed: boolean;
  stdout: string;
  stderr: string;
}

function toExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error), killed: false, stdout: '', stderr: '' };
  }
  const text = (key: string): string => {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : '';
  };
  return {
    message: text('message') || String(error),
    killed: Reflect.get(error, 'killed') === true,
    stdout: text('stdout'),
    stderr: text('stderr'),
  };
}

function readGraphError(payload: unknown): { code: string; message: string } | null {
  if (typeof payload !== 'object' || payload === null || !('error' in payload)) {
    return null;
  }
  const error = payload.error;
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : 'Unknown';
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return { code, message };
}

function toGraphError(graphError: { code: string; message: string }): Error {
  if (AUTH_ERROR_CODES.has(graphError.code)) {
    return new AuthRequiredError(`Graph rejected the session: ${graphError.code}`);
  }
  return new GraphApiError(graphError.code, graphError.message);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class MgcService {
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly runInteractive: InteractiveRunner;

  constructor(options: MgcServiceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.run = options.run ?? defaultRunner;
    this.runInteractive = options.runInteractive ?? defaultInteractiveRunner;
  }

  async executeCommand(command: string): Promise<unknown> {
    if (process.env.DEBUG) {
      console.error(chalk.gray(`Executing: ${command}`));
    }

    let output: CommandOutput;
    try {
      output = await this.run(command, {
        timeout: this.timeoutMs,
        maxBuffer: 10 * 1024 * 1024 // 10MB
      });
    } catch (error) {
      const failure = toExecFailure(error);
      // mgc は API エラーを JSON で返したうえで非0終了することがある
      const graphError = readGraphError(tryParseJson(failure.stdout));
      if (graphError) {
        throw toGraphError(graphError);
      }
      if (failure.killed) {
        throw new TransientFetchError(`MGC command timed out after ${this.timeoutMs / 1000}s`, true, { cause: error });
      }
      if (NO_SESSION_PATTERN.test(failure.stderr)) {
        throw new AuthRequiredError(`No Graph session: ${failure.stderr.trim()}`, { cause: error });
      }
      const detail = failure.stderr.trim() || failure.message;
      throw new TransientFetchError(`MGC command failed: ${detail}`, false, { cause: error });
    }

    if (output.stderr && process.env.DEBUG) {
      console.error(chalk.gray(`MGC stderr: ${output.stderr.trim()}`));
    }

    const result = tryParseJson(output.stdout);
    if (result === undefined) {
      throw new GraphApiError('InvalidResponse', 'mgc returned output that is not JSON');
    }
    const graphError = readGraphError(result);
    if (graphError) {
      throw toGraphError(graphError);
    }
    return result;
  }

  async getCalendarView(start: Date, end: Date): Promise<CalendarEvent[]> {
    // 時刻はすべて UTC で受け取る
    const command = `mgc me calendar-view list \
      --headers 'Prefer=outlook.timezone="UTC"' \
      --select "${EVENT_FIELDS}" \
      --start-date-time "${toGraphDateTime(start)}" \
      --end-date-time "${toGraphDateTime(end)}" \
      --filter "isCancelled eq false" \
      --orderby "start/dateTime" \
      --top 50`;

    const result = await this.executeCommand(command);
    const parsed = CalendarViewResponseSchema.safeParse(result);
    if (!parsed.success) {
      throw new GraphApiError('InvalidResponse', `Unexpected calendar-view payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    return toCalendarEvents(parsed.data.value, raw => {
      if (process.env.DEBUG) {
        console.error(chalk.yellow(`Skipping event with unparsable time: ${raw.subject ?? raw.id ?? '(untitled)'}`));
      }
    });
  }

  async getTodaysEvents(now: Date = new Date()): Promise<CalendarEvent[]> {
    const { start, end } = getTodayRange(now);
    return this.getCalendarView(start, end);
  }

  async getUpcomingEvents(days: number = 7, now: Date = new Date()): Promise<CalendarEvent[]> {
    const { start, end } = getUpcomingRange(now, days);
    return this.getCalendarView(start, end);
  }

  /**
   * セッションが有効かどうか。通信障害やタイムアウトは false にせずそのまま投げる
   */
  async checkAuth(): Promise<boolean> {
    try {
      await this.executeCommand('mgc me get --select id');
      return true;
    } catch (error) {
      if (isAuthRequired(error)) {
        return false;
      }
      throw error;
    }
  }

  async login(scopes: string, options: { stdoutToStderr?: boolean } = {}): Promise<void> {
    const code = await this.runInteractive(
      'mgc',
      ['login', '--scopes', scopes, '--strategy', 'InteractiveBrowser'],
      { stdoutToStderr: options.stdoutToStderr ?? false }
    );
    if (code !== 0) {
      throw new Error(`Login process exited with code ${code}`);
    }
  }

  async logout(options: { stdoutToStderr?: boolean } = {}): Promise<void> {
    const code = await this.runInteractive('mgc', ['logout'], { stdoutToStderr: options.stdoutToStderr ?? false });
    if (code !== 0) {
      throw new Error(`Logout process exited with code ${code}`);
    }
  }
}
