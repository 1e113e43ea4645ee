import { exec } from 'child_process';
import { promisify } from 'util';
import chalk from 'chalk';
import { MgcService } from '../services/mgc.js';
import { getErrorMessage } from '../types/errors.js';
import { getConfigPath, loadConfig } from '../utils/config.js';
import { getThemePath, loadTheme } from '../utils/theme.js';

const execAsync = promisify(exec);

export interface CheckResult {
  name: string;
  status: 'ok' | 'error' | 'warning';
  message: string;
}

export function checkNodeVersion(version: string = process.version): CheckResult {
  const majorVersion = parseInt(version.replace(/^v/, '').split('.')[0], 10);
  if (Number.isNaN(majorVersion)) {
    return { name: 'Node.js', status: 'error', message: 'Could not detect Node.js version' };
  }
  if (majorVersion >= 20) {
    return { name: 'Node.js', status: 'ok', message: `${version} (>= 20.0.0 required)` };
  }
  return {
    name: 'Node.js',
    status: 'error',
    message: `${version} (>= 20.0.0 required) - Please upgrade Node.js`
  };
}

export async function runChecks(): Promise<CheckResult[]> {
  const checks: CheckResult[] = [checkNodeVersion()];

  // mgc installation check
  let mgcInstalled = false;
  try {
    const { stdout: mgcVersion } = await execAsync('mgc --version');
    mgcInstalled = true;
    checks.push({
      name: 'mgc (Microsoft Graph CLI)',
      status: 'ok',
      message: mgcVersion.trim()
    });
  } catch {
    checks.push({
      name: 'mgc (Microsoft Graph CLI)',
      status: 'error',
      message: 'Not installed. Run: brew install microsoftgraph/tap/msgraph-cli'
    });
  }

  // mgc authentication check
  if (mgcInstalled) {
    try {
      const isAuthenticated = await new MgcService().checkAuth();
      checks.push(isAuthenticated
        ? { name: 'mgc authentication', status: 'ok', message: 'Authenticated' }
        : { name: 'mgc authentication', status: 'warning', message: 'Not authenticated. Run: meeting-bar login' });
    } catch (error) {
      checks.push({ name: 'mgc authentication', status: 'warning', message: `Could not verify session: ${getErrorMessage(error)}` });
    }
  }

  // 設定ファイル
  try {
    const config = await loadConfig();
    checks.push({
      name: 'Configuration',
      status: 'ok',
      message: `${getConfigPath()} (refresh ${config.refreshInterval}s, timeout ${config.requestTimeoutSeconds}s)`
    });
  } catch (error) {
    checks.push({ name: 'Configuration', status: 'error', message: getErrorMessage(error) });
  }

  // テーマファイル
  try {
    const theme = await loadTheme();
    const icons = [theme.current, theme.urgent, theme.soon, theme.upcoming].map(style => style.icon).join(' ');
    checks.push({ name: 'Theme', status: 'ok', message: `${getThemePath()} ${icons}` });
  } catch (error) {
    checks.push({ name: 'Theme', status: 'error', message: getErrorMessage(error) });
  }

  return checks;
}

export async function doctor(): Promise<void> {
  console.log(chalk.bold('\n🩺 Meeting Bar Doctor\n'));
  console.log('Checking your environment...\n');

  const checks = await runChecks();

  // Display results
  console.log(chalk.gray('─'.repeat(60)));

  checks.forEach(check => {
    const icon = check.status === 'ok' ? '✅' :
                 check.status === 'warning' ? '⚠️ ' : '❌';
    const color = check.status === 'ok' ? chalk.green :
                  check.status === 'warning' ? chalk.yellow : chalk.red;

    console.log(`${icon} ${chalk.bold(check.name)}`);
    console.log(`   ${color(check.message)}`);
    console.log();
  });

  console.log(chalk.gray('─'.repeat(60)));

  // Summary
  const errors = checks.filter(c => c.status === 'error').length;
  const warnings = checks.filter(c => c.status === 'warning').length;

  if (errors > 0) {
    console.log(chalk.red(`\n❌ ${errors} error(s) found. Please fix them before using meeting-bar.`));
    process.exit(1);
  } else if (warnings > 0) {
    console.log(chalk.yellow(`\n⚠️  ${warnings} warning(s) found. Some features may not work properly.`));
  } else {
    console.log(chalk.green('\n✅ All checks passed! You\'re ready to use meeting-bar.'));
  }

  // Quick start guide
  console.log(chalk.bold('\n📚 Waybar module:'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.cyan('  "custom/meeting": {'));
  console.log(chalk.cyan('    "exec": "meeting-bar waybar",'));
  console.log(chalk.cyan('    "return-type": "json",'));
  console.log(chalk.cyan('    "interval": 60,'));
  console.log(chalk.cyan('    "on-click": "meeting-bar click"'));
  console.log(chalk.cyan('  }'));
  console.log();
}
