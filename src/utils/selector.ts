import { CalendarEvent, ClickTarget, EventStatus } from '../types/calendar.js';
import { classifyEvent } from './status.js';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// 表示対象として調べる順番。past は選ばない
export const STATUS_PRIORITY: readonly EventStatus[] = ['current', 'urgent', 'soon', 'upcoming'];

/**
 * 実際に時間を押さえている予定かどうか
 * 終日・24時間以上・Free 表示の予定はプレースホルダー扱い
 */
export function isBlockingEvent(event: CalendarEvent): boolean {
  if (event.isAllDay) {
    return false;
  }
  if (event.showAs === 'free') {
    return false;
  }
  return event.end.getTime() - event.start.getTime() < ONE_DAY_MS;
}

/**
 * 表示・クリックの両方で使う唯一の選択ロジック
 * 状態の優先順に、まずブロッキングな予定、なければ任意の予定を入力順で探す
 */
export function selectBestEvent(events: readonly CalendarEvent[], now: Date): CalendarEvent | null {
  if (events.length === 0) {
    return null;
  }

  const statuses = events.map(event => classifyEvent(event, now));

  const matches = (index: number, target: EventStatus): boolean => {
    if (statuses[index] !== target) {
      return false;
    }
    // 時計のずれや長さ0の予定で upcoming になったものは除外
    if (target === 'upcoming' && events[index].start.getTime() <= now.getTime()) {
      return false;
    }
    return true;
  };

  for (const target of STATUS_PRIORITY) {
    const blocking = events.find((event, i) => matches(i, target) && isBlockingEvent(event));
    if (blocking) {
      return blocking;
    }

    const fallback = events.find((_, i) => matches(i, target));
    if (fallback) {
      return fallback;
    }
  }

  return null;
}

/**
 * Teams の参加 URL を msteams: スキームに変換する
 */
export function toTeamsAppUrl(url: string): string {
  return url.replace(/^https:\/\//, 'msteams://');
}

/**
 * クリック時に開くリンクを決める。開催中か直前（urgent）の予定のみ対象
 */
export function resolveClickTarget(event: CalendarEvent | null, now: Date): ClickTarget | null {
  if (!event) {
    return null;
  }

  const status = classifyEvent(event, now);
  if (status !== 'current' && status !== 'urgent') {
    return null;
  }

  if (event.isOnlineMeeting && event.teamsLink) {
    return { kind: 'teams', url: event.teamsLink, appUrl: toTeamsAppUrl(event.teamsLink) };
  }
  if (event.webLink) {
    return { kind: 'web', url: event.webLink };
  }
  return null;
}
