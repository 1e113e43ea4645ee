import chalk from 'chalk';
import { createServices } from '../services/calendar.js';
import { getErrorMessage } from '../types/errors.js';
import { loadConfig } from '../utils/config.js';
import { renderExtendedTooltip } from '../utils/format.js';
import { loadTheme } from '../utils/theme.js';

export async function showTooltip(): Promise<void> {
  try {
    const config = await loadConfig();
    const theme = await loadTheme();
    const { calendar } = createServices(config);

    const snapshot = await calendar.fetchSnapshot({ allowInteractive: true });
    console.log(renderExtendedTooltip(
      snapshot.todaysEvents,
      snapshot.upcomingEvents,
      snapshot.fetchedAt,
      theme,
      config.maxUpcomingInTooltip
    ));
  } catch (error) {
    console.error(chalk.red('Tooltip failed:'), getErrorMessage(error));
    process.exit(1);
  }
}
