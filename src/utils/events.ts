import { z } from 'zod';
import { CalendarEvent, ShowAs } from '../types/calendar.js';
import { extractTeamsLink } from './teams.js';

const EmailAddressSchema = z.object({
  address: z.string().nullish(),
  name: z.string().nullish(),
}).passthrough();

const DateTimeTimeZoneSchema = z.object({
  dateTime: z.string(),
  timeZone: z.string().optional(),
});

// Graph calendar-view のイベント。使わないフィールドはそのまま通す
export const GraphEventSchema = z.object({
  id: z.string().optional(),
  subject: z.string().nullish(),
  start: DateTimeTimeZoneSchema.nullish(),
  end: DateTimeTimeZoneSchema.nullish(),
  location: z.object({ displayName: z.string().nullish() }).passthrough().nullish(),
  webLink: z.string().nullish(),
  body: z.object({
    contentType: z.string().optional(),
    content: z.string().nullish(),
  }).nullish(),
  organizer: z.object({ emailAddress: EmailAddressSchema.nullish() }).passthrough().nullish(),
  attendees: z.array(z.object({ emailAddress: EmailAddressSchema.nullish() }).passthrough()).nullish(),
  isOnlineMeeting: z.boolean().nullish(),
  onlineMeeting: z.object({ joinUrl: z.string().nullish() }).passthrough().nullish(),
  isAllDay: z.boolean().nullish(),
  isCancelled: z.boolean().nullish(),
  showAs: z.string().nullish(),
}).passthrough();

export const CalendarViewResponseSchema = z.object({
  value: z.array(GraphEventSchema).default([]),
}).passthrough();

export type GraphEvent = z.infer<typeof GraphEventSchema>;

const SHOW_AS_VALUES: readonly ShowAs[] = ['free', 'tentative', 'busy', 'oof', 'workingElsewhere', 'unknown'];

const UTC_ZONES = new Set(['utc', 'etc/utc', 'gmt', 'coordinated universal time']);

const GRAPH_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Graph の dateTime を Date に変換する
 * .NET 形式（小数7桁）、オフセット無し、RFC3339 を受け付ける。
 * オフセットが無い場合は timeZone が UTC なら UTC、それ以外はローカル時刻として扱う。
 * 解釈できない値は null
 */
export function parseGraphDateTime(dateTime: string | undefined | null, timeZone?: string): Date | null {
  if (!dateTime) {
    return null;
  }

  const match = dateTime.trim().match(GRAPH_DATE_TIME);
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, fraction, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s ? Number(s) : 0;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  // 2月31日のような存在しない日付は繰り上げずに弾く
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) {
    return null;
  }

  let result: Date;
  if (offset) {
    const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
    result = new Date(utc - parseOffsetMinutes(offset) * 60 * 1000);
  } else if (timeZone && UTC_ZONES.has(timeZone.toLowerCase())) {
    result = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  } else {
    result = new Date(year, month - 1, day, hour, minute, second, millis);
  }

  return Number.isNaN(result.getTime()) ? null : result;
}

function parseOffsetMinutes(offset: string): number {
  if (offset.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function normalizeShowAs(value: string | null | undefined): ShowAs {
  const found = SHOW_AS_VALUES.find(candidate => candidate === value);
  return found ?? 'unknown';
}

/**
 * Graph のイベントを CalendarEvent に変換する
 * 開始・終了が解釈できないイベントは null（時間判定の対象外）
 */
export function toCalendarEvent(raw: GraphEvent): CalendarEvent | null {
  const start = parseGraphDateTime(raw.start?.dateTime, raw.start?.timeZone);
  const parsedEnd = parseGraphDateTime(raw.end?.dateTime, raw.end?.timeZone);
  if (!start || !parsedEnd) {
    return null;
  }
  // end >= start を保証
  const end = parsedEnd.getTime() < start.getTime() ? start : parsedEnd;

  const body = raw.body?.content ?? '';
  const location = raw.location?.displayName ?? '';

  let teamsLink = '';
  let isOnlineMeeting = false;
  if (raw.onlineMeeting) {
    isOnlineMeeting = true;
    teamsLink = raw.onlineMeeting.joinUrl ?? '';
  } else {
    const extracted = extractTeamsLink(body, location);
    teamsLink = extracted.link;
    isOnlineMeeting = extracted.isTeams || raw.isOnlineMeeting === true;
  }

  return {
    id: raw.id ?? '',
    subject: raw.subject ?? '',
    start,
    end,
    location,
    webLink: raw.webLink ?? '',
    teamsLink,
    isOnlineMeeting,
    organizer: raw.organizer?.emailAddress?.name ?? '',
    attendees: (raw.attendees ?? [])
      .map(attendee => attendee.emailAddress?.name ?? '')
      .filter(name => name !== ''),
    body,
    isAllDay: raw.isAllDay ?? false,
    showAs: normalizeShowAs(raw.showAs),
  };
}

/**
 * calendar-view の結果をまとめて変換する。入力順は保持する
 */
export function toCalendarEvents(rawEvents: readonly GraphEvent[], onSkip?: (raw: GraphEvent) => void): CalendarEvent[] {
  const events: CalendarEvent[] = [];
  for (const raw of rawEvents) {
    const event = toCalendarEvent(raw);
    if (event) {
      events.push(event);
    } else if (onSkip) {
      onSkip(raw);
    }
  }
  return events;
}
