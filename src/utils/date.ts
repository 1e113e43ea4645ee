import { addDays, format, isSameDay, startOfDay } from 'date-fns';

export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * 今日（ローカルの0時から翌日0時まで）
 */
export function getTodayRange(now: Date = new Date()): TimeRange {
  const start = startOfDay(now);
  return {
    start,
    end: addDays(start, 1),
  };
}

/**
 * 現在から指定日数先まで
 */
export function getUpcomingRange(now: Date = new Date(), days: number = 7): TimeRange {
  return {
    start: now,
    end: addDays(now, days),
  };
}

/**
 * Graph の startDateTime/endDateTime に渡す UTC 文字列
 */
export function toGraphDateTime(date: Date): string {
  return date.toISOString();
}

/**
 * 開始までの残り時間を "in 12m" / "in 2h5m" 形式にする
 */
export function formatTimeUntil(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60000));
  if (totalMinutes < 60) {
    return `in ${totalMinutes}m`;
  }
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `in ${hours}h${minutes}m`;
}

export function formatClock(date: Date): string {
  return format(date, 'HH:mm');
}

export function formatTimeSpan(start: Date, end: Date): string {
  return `${formatClock(start)}-${formatClock(end)}`;
}

/**
 * 週表示用の日時ラベル。今日は時刻のみ、明日は "Tomorrow HH:mm"
 */
export function formatRelativeDay(date: Date, now: Date): string {
  if (isSameDay(date, now)) {
    return formatClock(date);
  }
  if (isSameDay(date, addDays(now, 1))) {
    return `Tomorrow ${formatClock(date)}`;
  }
  return format(date, 'EEE d/M HH:mm');
}
