import chalk from 'chalk';
import { createServices } from '../../services/calendar.js';
import { getErrorMessage } from '../../types/errors.js';
import { loadConfig } from '../../utils/config.js';

export async function login(options: { scopes?: string } = {}): Promise<void> {
  try {
    const config = await loadConfig();
    // 読み取り専用の権限だけを要求する
    const scopes = options.scopes || config.scopes;
    const { auth } = createServices({ ...config, scopes });

    console.log(chalk.blue('Logging in to Microsoft Graph...'));
    console.log(chalk.gray(`Requesting scopes: ${scopes}`));
    console.log(chalk.gray('Opening browser for authentication...'));

    await auth.login();

    if (!await auth.isAuthenticated()) {
      throw new Error('Login finished but no valid session was found');
    }

    console.log(chalk.green('\n✓ Successfully logged in!'));
    console.log(chalk.gray('\nYou can now:'));
    console.log(chalk.gray('- Read your calendar events'));
    console.log(chalk.gray('- Join Teams meetings from the status bar'));

    console.log(chalk.gray('\nNext steps:'));
    console.log(chalk.cyan('  meeting-bar widget    # Interactive terminal widget'));
    console.log(chalk.cyan('  meeting-bar waybar    # JSON output for Waybar'));
    console.log(chalk.cyan('  meeting-bar doctor    # Check your setup'));
  } catch (error) {
    console.error(chalk.red('\nLogin failed:'), getErrorMessage(error));
    console.error(chalk.gray('\nTroubleshooting tips:'));
    console.error(chalk.gray('1. Make sure mgc is installed: brew install microsoftgraph/tap/msgraph-cli'));
    console.error(chalk.gray('2. Clear existing credentials: rm -rf ~/.mgc'));
    console.error(chalk.gray('3. Try again with: meeting-bar login'));
    process.exit(1);
  }
}
