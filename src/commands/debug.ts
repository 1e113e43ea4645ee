import chalk from 'chalk';
import { createServices } from '../services/calendar.js';
import { CalendarEvent } from '../types/calendar.js';
import { getErrorMessage } from '../types/errors.js';
import { loadConfig } from '../utils/config.js';
import { formatTimeUntil } from '../utils/date.js';
import { isBlockingEvent } from '../utils/selector.js';
import { classifyEvent, timeUntil } from '../utils/status.js';

const MAX_EVENTS = 5;

/**
 * イベント1件分の詳細（判定結果を含む）
 */
export function describeEvent(event: CalendarEvent, index: number, now: Date): string[] {
  const status = classifyEvent(event, now);
  const lines = [
    chalk.bold(`📅 Event ${index + 1}:`),
    `  📝 Subject: ${event.subject}`,
    `  🕐 Start: ${event.start.toISOString()}`,
    `  🕐 End: ${event.end.toISOString()}`,
    `  📍 Location: ${event.location}`,
    `  🔗 Teams: ${event.isOnlineMeeting}`,
  ];
  if (event.teamsLink) {
    lines.push(`  🔗 Teams Link: ${event.teamsLink}`);
  }
  lines.push(`  🌐 Web Link: ${event.webLink}`);
  lines.push(`  📊 Status: ${status}`);
  lines.push(`  🧱 Blocking: ${isBlockingEvent(event)}`);
  if (status !== 'past' && status !== 'current') {
    lines.push(`  ⏰ Time until: ${formatTimeUntil(timeUntil(event, now))}`);
  }
  return lines;
}

export async function debugCalendar(): Promise<void> {
  try {
    console.log(chalk.bold('🔍 Debug Calendar Access'));
    console.log(chalk.gray('─'.repeat(50)));

    const config = await loadConfig();
    const { calendar } = createServices(config);

    const now = new Date();
    console.log(`📅 Current time: ${now.toISOString()}`);
    console.log(`🌍 Timezone: ${Intl.DateTimeFormat().resolvedOptions().timeZone}`);
    console.log();

    const snapshot = await calendar.fetchSnapshot({ allowInteractive: true }, now);
    console.log(`📊 Found ${snapshot.todaysEvents.length} today's events`);
    console.log(`📊 Found ${snapshot.upcomingEvents.length} upcoming events`);
    console.log();

    // 今日の予定が無ければ今後の予定を表示
    let events = snapshot.todaysEvents;
    if (events.length === 0 && snapshot.upcomingEvents.length > 0) {
      console.log(chalk.yellow('📌 No events today, showing upcoming events instead:'));
      events = snapshot.upcomingEvents;
    }

    if (events.length === 0) {
      console.log(chalk.yellow('❌ No events found'));
      console.log(chalk.gray('This could be because:'));
      console.log(chalk.gray('  • Events are in a different calendar'));
      console.log(chalk.gray('  • Events have start/end times that could not be parsed'));
    }

    events.slice(0, MAX_EVENTS).forEach((event, index) => {
      console.log(describeEvent(event, index, now).join('\n'));
      console.log();
    });
    if (events.length > MAX_EVENTS) {
      console.log(chalk.gray(`... and ${events.length - MAX_EVENTS} more events\n`));
    }

    if (snapshot.selected) {
      console.log(chalk.bold(`🎯 Selected: ${snapshot.selected.subject}`));
      console.log(`📊 Status: ${classifyEvent(snapshot.selected, now)}`);
    } else {
      console.log(chalk.gray('🎯 No meeting selected'));
    }
  } catch (error) {
    console.error(chalk.red('Debug failed:'), getErrorMessage(error));
    process.exit(1);
  }
}
