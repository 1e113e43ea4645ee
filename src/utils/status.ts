import { CalendarEvent, EventStatus } from '../types/calendar.js';

export const URGENT_THRESHOLD_MS = 5 * 60 * 1000;
export const SOON_THRESHOLD_MS = 15 * 60 * 1000;

/**
 * イベントの開始までの時間（ミリ秒）。開始済みなら負の値
 */
export function timeUntil(event: Pick<CalendarEvent, 'start'>, now: Date): number {
  return event.start.getTime() - now.getTime();
}

/**
 * 現在時刻からイベントの状態を判定する
 * 状態はキャッシュしないので、時刻が進んだら呼び直すこと
 */
export function classifyEvent(event: Pick<CalendarEvent, 'start' | 'end'>, now: Date): EventStatus {
  const nowMs = now.getTime();

  if (nowMs >= event.end.getTime()) {
    return 'past';
  }
  if (event.start.getTime() <= nowMs) {
    return 'current';
  }

  const delta = timeUntil(event, now);
  if (delta <= URGENT_THRESHOLD_MS) {
    return 'urgent';
  }
  if (delta <= SOON_THRESHOLD_MS) {
    return 'soon';
  }
  return 'upcoming';
}
