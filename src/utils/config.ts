import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from '../types/errors.js';

// 設定ファイルのスキーマ
const ConfigSchema = z.object({
  refreshInterval: z.number().int().positive().default(60),
  requestTimeoutSeconds: z.number().positive().default(30),
  compact: z.boolean().default(false),
  scopes: z.string().min(1).default('Calendars.Read User.Read'),
  upcomingDays: z.number().int().positive().default(7),
  maxUpcomingInTooltip: z.number().int().nonnegative().default(5),
}).passthrough();

export type Config = z.infer<typeof ConfigSchema>;

// 設定ファイルのパス
export const getConfigPath = () => path.join(getDataDir(), 'config.json');

function parseNumberEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number (got "${raw}")`);
  }
  return value;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    // ファイルが存在しない場合はデフォルト値を使う
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Failed to read config file ${configPath}: ${getErrorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * 設定を読み込む
 * 優先順位：環境変数 > 設定ファイル > デフォルト値
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<Config> {
  const config = await readConfigFile(configPath);

  // 環境変数で上書き
  const refresh = parseNumberEnv('MEETING_BAR_REFRESH');
  if (refresh !== undefined) {
    config.refreshInterval = refresh;
  }
  const timeout = parseNumberEnv('MEETING_BAR_TIMEOUT');
  if (timeout !== undefined) {
    config.requestTimeoutSeconds = timeout;
  }
  if (process.env.MEETING_BAR_SCOPES) {
    config.scopes = process.env.MEETING_BAR_SCOPES;
  }

  // バリデーション
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new ConfigError(`Invalid configuration in ${configPath}: ${issues}`);
  }
  return result.data;
}

/**
 * データ保存用のベースディレクトリを取得
 */
export function getDataDir(): string {
  return process.env.MEETING_BAR_HOME || path.join(homedir(), '.meeting-bar');
}
