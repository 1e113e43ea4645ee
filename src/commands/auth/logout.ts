import * as fs from 'fs/promises';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { createServices } from '../../services/calendar.js';
import { getErrorMessage } from '../../types/errors.js';
import { getDataDir, loadConfig } from '../../utils/config.js';

export async function logout(options: { all?: boolean; yes?: boolean } = {}): Promise<void> {
  try {
    if (!options.yes) {
      const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
        {
          type: 'confirm',
          name: 'confirmed',
          message: options.all
            ? 'Log out and delete local settings (config.json, theme.yaml)?'
            : 'Log out from Microsoft Graph?',
          default: false
        }
      ]);
      if (!confirmed) {
        console.log(chalk.yellow('Cancelled'));
        return;
      }
    }

    console.log(chalk.blue('Logging out from Microsoft Graph...'));

    const config = await loadConfig();
    const { auth } = createServices(config);
    await auth.logout();

    // --all の場合はローカル設定も削除
    if (options.all) {
      await fs.rm(getDataDir(), { recursive: true, force: true });
      console.log(chalk.gray(`Removed ${getDataDir()}`));
    }

    console.log(chalk.green('\n✓ Successfully logged out!'));
    console.log(chalk.gray('\nTo login again:'));
    console.log(chalk.cyan('  meeting-bar login'));
  } catch (error) {
    console.error(chalk.red('\nLogout failed:'), getErrorMessage(error));
    process.exit(1);
  }
}
