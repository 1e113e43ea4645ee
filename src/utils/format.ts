import chalk from 'chalk';
import { CalendarEvent } from '../types/calendar.js';
import { WaybarOutput } from '../types/waybar.js';
import { isAuthRequired, getErrorMessage } from '../types/errors.js';
import { classifyEvent, timeUntil } from './status.js';
import { formatClock, formatRelativeDay, formatTimeSpan, formatTimeUntil } from './date.js';
import { StatusTheme } from './theme.js';

const MAX_WAYBAR_TEXT = 50;
const MAX_COMPACT_TITLE = 30;

/**
 * Waybar は Pango マークアップとして解釈するのでエスケープする
 */
export function escapePangoMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function describeTitle(event: CalendarEvent, escape: (text: string) => string): string {
  let title = escape(event.subject);
  if (event.isOnlineMeeting) {
    title += ' (Teams)';
  }
  if (event.location && !event.isOnlineMeeting) {
    title += ` @ ${escape(event.location)}`;
  }
  return title;
}

const identity = (text: string) => text;

// サロゲートペアを分割しないようコードポイント単位で数える
function codePointLength(text: string): number {
  return Array.from(text).length;
}

function truncateCodePoints(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

/**
 * ステータスバーに表示する1行テキスト
 * 切り詰めは生の件名に対して行い、エスケープはその後（実体参照を途中で切らない）
 */
export function renderWaybarText(event: CalendarEvent, now: Date, theme: StatusTheme): string {
  const status = classifyEvent(event, now);
  const { icon } = theme[status];

  let text: string;
  if (status === 'upcoming') {
    const suffix = ` (${formatTimeUntil(timeUntil(event, now))})`;
    text = codePointLength(`${icon} ${event.subject}${suffix}`) > MAX_WAYBAR_TEXT
      ? `${icon} ${escapePangoMarkup(truncateCodePoints(event.subject, 40))}...`
      : `${icon} ${escapePangoMarkup(event.subject)}${suffix}`;
  } else {
    text = codePointLength(`${icon} ${event.subject}`) > MAX_WAYBAR_TEXT
      ? `${icon} ${escapePangoMarkup(truncateCodePoints(event.subject, 45))}...`
      : `${icon} ${escapePangoMarkup(event.subject)}`;
  }

  if (event.isOnlineMeeting) {
    text = `[T] ${text}`;
  }
  return text;
}

/**
 * 今日の予定一覧（Waybar のツールチップ用）
 */
export function renderScheduleTooltip(
  todaysEvents: readonly CalendarEvent[],
  selected: CalendarEvent | null,
  now: Date,
  theme: StatusTheme
): string {
  const lines = ['📅 Today\'s Schedule:', ''];

  if (todaysEvents.length === 0) {
    lines.push('No meetings today');
    return lines.join('\n');
  }

  for (const event of todaysEvents) {
    const { icon } = theme[classifyEvent(event, now)];
    lines.push(`${icon} ${formatTimeSpan(event.start, event.end)} ${describeTitle(event, escapePangoMarkup)}`);
  }

  if (selected) {
    lines.push('');
    lines.push('💡 Click to open meeting link');
    lines.push(selected.isOnlineMeeting
      ? '🔗 Teams meeting - will open directly in Teams'
      : '🌐 Will open in browser');
  }

  return lines.join('\n');
}

export function buildWaybarOutput(
  selected: CalendarEvent | null,
  todaysEvents: readonly CalendarEvent[],
  now: Date,
  theme: StatusTheme
): WaybarOutput {
  const tooltip = renderScheduleTooltip(todaysEvents, selected, now, theme);

  if (!selected) {
    return {
      text: 'No upcoming meetings',
      class: 'no-meeting',
      alt: 'no-meeting',
      tooltip,
    };
  }

  const status = classifyEvent(selected, now);
  return {
    text: renderWaybarText(selected, now, theme),
    class: theme[status].className,
    alt: status,
    tooltip,
  };
}

/**
 * 取得失敗時の出力。認証切れはクリックで再認証できることを示す
 */
export function buildErrorOutput(error: unknown): WaybarOutput {
  if (isAuthRequired(error)) {
    return {
      text: 'Auth Required',
      class: 'error',
      alt: 'auth-required',
      tooltip: 'Click to authenticate',
    };
  }
  return {
    text: 'Calendar Error',
    class: 'error',
    alt: 'error',
    tooltip: getErrorMessage(error),
  };
}

/**
 * ターミナルウィジェットの1行表示
 */
export function renderTerminalLine(event: CalendarEvent, now: Date, theme: StatusTheme, compact: boolean = false): string {
  const status = classifyEvent(event, now);
  const style = theme[status];

  let title = event.subject;
  if (compact && title.length > MAX_COMPACT_TITLE) {
    title = title.slice(0, MAX_COMPACT_TITLE - 3) + '...';
  }

  let timeStr = formatClock(event.start);
  if (status === 'current') {
    timeStr = formatTimeSpan(event.start, event.end);
  } else if (status !== 'past') {
    timeStr = formatTimeUntil(timeUntil(event, now));
  }

  const parts = [style.icon];
  if (event.isOnlineMeeting) {
    parts.push(chalk.hex('#0078D4').bold('Teams'));
  }
  parts.push(chalk.gray(timeStr));
  parts.push(chalk.bold(title));

  return chalk[style.color](parts.join(' '));
}

/**
 * tooltip コマンド用。今日の予定と今後の予定をまとめて表示する
 */
export function renderExtendedTooltip(
  todaysEvents: readonly CalendarEvent[],
  upcomingEvents: readonly CalendarEvent[],
  now: Date,
  theme: StatusTheme,
  maxUpcoming: number = 5
): string {
  const lines: string[] = [chalk.bold('📅 Today\'s Schedule'), ''];

  if (todaysEvents.length === 0) {
    lines.push('No meetings today');
  } else {
    for (const event of todaysEvents) {
      const { icon } = theme[classifyEvent(event, now)];
      lines.push(`${icon} ${chalk.gray(formatTimeSpan(event.start, event.end))} ${describeTitle(event, identity)}`);
    }
  }

  lines.push('');
  lines.push(chalk.bold('🔮 Upcoming Events'));
  lines.push('');

  if (upcomingEvents.length === 0) {
    lines.push('No upcoming meetings');
  } else {
    upcomingEvents.slice(0, maxUpcoming).forEach(event => {
      const { icon } = theme[classifyEvent(event, now)];
      lines.push(`${icon} ${chalk.gray(formatRelativeDay(event.start, now))} ${describeTitle(event, identity)}`);
    });
    if (upcomingEvents.length > maxUpcoming) {
      lines.push(`... and ${upcomingEvents.length - maxUpcoming} more events`);
    }
  }

  return lines.join('\n');
}
