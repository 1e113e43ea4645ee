import chalk from 'chalk';
import { createServices } from '../../services/calendar.js';
import { getErrorMessage } from '../../types/errors.js';
import { loadConfig } from '../../utils/config.js';
import { login } from './login.js';

/**
 * セッションを破棄してからログインし直す
 */
export async function runReauth(): Promise<void> {
  try {
    const config = await loadConfig();
    const { auth } = createServices(config);
    await auth.logout();
  } catch (error) {
    console.error(chalk.yellow(`Warning: failed to clear tokens: ${getErrorMessage(error)}`));
  }

  console.log(chalk.blue('🔄 Re-authenticating...'));
  console.log(chalk.gray('Starting fresh authentication process...'));

  await login();
}
