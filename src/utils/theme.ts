import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { EventStatus } from '../types/calendar.js';
import { ConfigError, getErrorMessage } from '../types/errors.js';
import { getDataDir } from './config.js';

const ThemeColorSchema = z.enum(['green', 'red', 'yellow', 'blue', 'cyan', 'magenta', 'gray', 'white']);

export type ThemeColor = z.infer<typeof ThemeColorSchema>;

export interface StatusStyle {
  readonly icon: string;
  readonly className: string;
  readonly color: ThemeColor;
}

export type StatusTheme = Readonly<Record<EventStatus, StatusStyle>>;

const defaultStyles: Record<EventStatus, StatusStyle> = {
  current: { icon: '🟢', className: 'current', color: 'green' },
  urgent: { icon: '🔴', className: 'urgent', color: 'red' },
  soon: { icon: '🟡', className: 'soon', color: 'yellow' },
  upcoming: { icon: '🔵', className: 'upcoming', color: 'blue' },
  past: { icon: '⚫', className: 'past', color: 'gray' },
};

export const DEFAULT_THEME: StatusTheme = Object.freeze(defaultStyles);

// theme.yaml のスキーマ（各状態ごとに部分的に上書きできる）
const StatusStyleOverrideSchema = z.object({
  icon: z.string().min(1).optional(),
  className: z.string().min(1).optional(),
  color: ThemeColorSchema.optional(),
}).strict();

const ThemeFileSchema = z.object({
  current: StatusStyleOverrideSchema.optional(),
  urgent: StatusStyleOverrideSchema.optional(),
  soon: StatusStyleOverrideSchema.optional(),
  upcoming: StatusStyleOverrideSchema.optional(),
  past: StatusStyleOverrideSchema.optional(),
}).strict();

export type ThemeOverrides = z.infer<typeof ThemeFileSchema>;

export const getThemePath = () => path.join(getDataDir(), 'theme.yaml');

/**
 * デフォルトテーマに上書きを適用した新しいテーマを返す
 */
export function mergeTheme(overrides: ThemeOverrides, base: StatusTheme = DEFAULT_THEME): StatusTheme {
  const build = (status: EventStatus): StatusStyle => ({ ...base[status], ...overrides[status] });
  return Object.freeze({
    current: build('current'),
    urgent: build('urgent'),
    soon: build('soon'),
    upcoming: build('upcoming'),
    past: build('past'),
  });
}

export function parseTheme(content: string): StatusTheme {
  const loaded = yaml.load(content);
  if (loaded === undefined || loaded === null) {
    return DEFAULT_THEME;
  }
  const result = ThemeFileSchema.safeParse(loaded);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new ConfigError(`Invalid theme: ${issues}`);
  }
  return mergeTheme(result.data);
}

/**
 * theme.yaml を読み込む。ファイルが無ければデフォルト
 */
export async function loadTheme(themePath: string = getThemePath()): Promise<StatusTheme> {
  let content: string;
  try {
    content = await fs.readFile(themePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return DEFAULT_THEME;
    }
    throw new ConfigError(`Failed to read theme file ${themePath}: ${getErrorMessage(error)}`, { cause: error });
  }

  try {
    return parseTheme(content);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${error.message} (${themePath})`, { cause: error });
    }
    throw new ConfigError(`Theme file ${themePath} is not valid YAML: ${getErrorMessage(error)}`, { cause: error });
  }
}
