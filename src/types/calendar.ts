export type ShowAs = 'free' | 'tentative' | 'busy' | 'oof' | 'workingElsewhere' | 'unknown';

/**
 * 正規化済みのカレンダーイベント。ポーリングごとに作り直し、変更しない。
 */
export interface CalendarEvent {
  readonly id: string;
  readonly subject: string;
  readonly start: Date;
  readonly end: Date;
  readonly location: string;
  readonly webLink: string;
  readonly teamsLink: string;
  readonly isOnlineMeeting: boolean;
  readonly organizer: string;
  readonly attendees: readonly string[];
  readonly body: string;
  readonly isAllDay: boolean;
  readonly showAs: ShowAs;
}

export type EventStatus = 'past' | 'current' | 'urgent' | 'soon' | 'upcoming';

export type ClickTarget =
  | { kind: 'teams'; url: string; appUrl: string }
  | { kind: 'web'; url: string };
