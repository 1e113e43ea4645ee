import chalk from 'chalk';
import { CalendarService, createServices } from '../services/calendar.js';
import { WaybarOutput } from '../types/waybar.js';
import { getErrorMessage } from '../types/errors.js';
import { loadConfig } from '../utils/config.js';
import { buildErrorOutput, buildWaybarOutput } from '../utils/format.js';
import { StatusTheme, loadTheme } from '../utils/theme.js';

/**
 * 1回分の Waybar 出力を作る。失敗してもエラー形式の出力を返す
 */
export async function produceWaybarOutput(
  calendar: CalendarService,
  theme: StatusTheme,
  forceRefresh: boolean = false,
  now: Date = new Date()
): Promise<WaybarOutput> {
  try {
    const snapshot = await calendar.fetchSnapshot({
      allowInteractive: forceRefresh,
      forceRefresh,
      stdoutToStderr: true,
    }, now);
    return buildWaybarOutput(snapshot.selected, snapshot.todaysEvents, snapshot.fetchedAt, theme);
  } catch (error) {
    if (process.env.DEBUG) {
      console.error(chalk.red('Waybar update failed:'), getErrorMessage(error));
    }
    return buildErrorOutput(error);
  }
}

/**
 * Waybar の custom モジュールから呼ばれる。stdout には JSON 1行だけを出す
 * エラー時もステータスバー側が壊れないよう終了コードは 0
 */
export async function runWaybar(options: { forceRefresh?: boolean } = {}): Promise<void> {
  let output: WaybarOutput;
  try {
    const config = await loadConfig();
    const theme = await loadTheme();
    const { calendar } = createServices(config);
    output = await produceWaybarOutput(calendar, theme, options.forceRefresh ?? false);
  } catch (error) {
    output = buildErrorOutput(error);
  }

  console.log(JSON.stringify(output));
}
