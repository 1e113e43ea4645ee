import chalk from 'chalk';
import { CalendarService, CalendarSnapshot, createServices } from '../services/calendar.js';
import { LinkOpener } from '../services/opener.js';
import { getErrorMessage, isAuthRequired } from '../types/errors.js';
import { loadConfig } from '../utils/config.js';
import { resolveClickTarget } from '../utils/selector.js';
import { runReauth } from './auth/reauth.js';

export type ClickOutcome = 'opened' | 'open-failed' | 'no-action' | 'reauth' | 'error';

interface ClickDependencies {
  calendar: CalendarService;
  opener: LinkOpener;
  reauth: () => Promise<void>;
}

/**
 * ステータスバーのクリック処理
 * 認証切れなら再認証、開催中・直前の会議があればリンクを開く
 */
export async function handleClick(deps: ClickDependencies): Promise<ClickOutcome> {
  let snapshot: CalendarSnapshot;
  try {
    snapshot = await deps.calendar.fetchSnapshot({ allowInteractive: false });
  } catch (error) {
    if (!isAuthRequired(error)) {
      console.error(chalk.yellow('Failed to fetch events:'), getErrorMessage(error));
      return 'error';
    }

    console.log(chalk.blue('Authentication required, forcing token refresh...'));
    try {
      snapshot = await deps.calendar.fetchSnapshot({ allowInteractive: true, forceRefresh: true });
    } catch (retryError) {
      if (!isAuthRequired(retryError)) {
        console.error(chalk.yellow('Force refresh failed:'), getErrorMessage(retryError));
        return 'error';
      }
      console.error(chalk.yellow('Force refresh still failed with auth error:'), getErrorMessage(retryError));
      await deps.reauth();
      return 'reauth';
    }
  }

  const target = resolveClickTarget(snapshot.selected, snapshot.fetchedAt);
  if (!target) {
    // 開催中・直前の会議が無ければ何もしない
    return 'no-action';
  }

  return await deps.opener.open(target) ? 'opened' : 'open-failed';
}

export async function runClick(): Promise<void> {
  try {
    const config = await loadConfig();
    const { calendar } = createServices(config);
    await handleClick({
      calendar,
      opener: new LinkOpener(),
      reauth: runReauth,
    });
  } catch (error) {
    // クリックハンドラはステータスバーから呼ばれるので失敗しても 0 で終わる
    console.error(chalk.red('Click handler failed:'), getErrorMessage(error));
  }
}
