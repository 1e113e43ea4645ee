import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Writable } from 'stream';
import { LEFT_BUTTON, TerminalWidget, parseTerminalInput } from './widget.js';
import { AuthService } from '../services/auth.js';
import { CalendarService, CalendarSnapshot } from '../services/calendar.js';
import { MgcService } from '../services/mgc.js';
import { LinkOpener } from '../services/opener.js';
import { CalendarEvent } from '../types/calendar.js';
import { AuthRequiredError, GraphApiError, TransientFetchError } from '../types/errors.js';
import { DEFAULT_THEME } from '../utils/theme.js';

const now = new Date('2025-01-20T10:00:00Z');

const planning: CalendarEvent = {
  id: '1',
  subject: 'Planning',
  start: new Date('2025-01-20T10:45:00Z'),
  end: new Date('2025-01-20T11:00:00Z'),
  location: '',
  webLink: 'https://outlook.office365.com/owa/?itemid=1',
  teamsLink: '',
  isOnlineMeeting: false,
  organizer: '',
  attendees: [],
  body: '',
  isAllDay: false,
  showAs: 'busy'
};

const snapshotWith = (selected: CalendarEvent | null): CalendarSnapshot => ({
  fetchedAt: now,
  upcomingEvents: selected ? [selected] : [],
  todaysEvents: [],
  selected
});

describe('TerminalWidget', () => {
  let calendar: CalendarService;
  let opener: LinkOpener;
  let written: string[];
  let widget: TerminalWidget;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(now);

    const mgc = new MgcService({ run: vi.fn(), runInteractive: vi.fn() });
    calendar = new CalendarService(mgc, new AuthService(mgc, 'Calendars.Read'));
    opener = new LinkOpener(vi.fn(), 'linux');
    written = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        written.push(String(chunk));
        callback();
      }
    });
    widget = new TerminalWidget(calendar, opener, DEFAULT_THEME, { refreshInterval: 60, compact: false }, output);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should show a loading line before the first refresh', () => {
    expect(widget.render(now)).toBe('Loading...\n[enter] join  [r] refresh  [q] quit');
  });

  it('should show the selected meeting after a refresh', async () => {
    const fetch = vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(planning));

    await widget.refresh();

    expect(fetch).toHaveBeenCalledWith({ allowInteractive: false });
    expect(widget.render(now)).toBe('🔵 in 45m Planning\nUpdated 10:00  [enter] join  [r] refresh  [q] quit');
    expect(written).toHaveLength(1);
    expect(written[0].startsWith('\x1B[2J\x1B[H')).toBe(true);
  });

  it('should say when there is nothing to show', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(null));

    await widget.refresh();
    expect(widget.render(now)).toBe('No upcoming meetings\nUpdated 10:00  [enter] join  [r] refresh  [q] quit');
  });

  it('should keep running and show the error when a refresh fails', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockRejectedValue(new TransientFetchError('offline'));

    await expect(widget.refresh()).resolves.toBeUndefined();
    expect(widget.render(now)).toBe('Error: offline\n[enter] join  [r] refresh  [q] quit');
  });

  it('should keep the last meeting on screen when a refresh fails temporarily', async () => {
    vi.spyOn(calendar, 'fetchSnapshot')
      .mockResolvedValueOnce(snapshotWith(planning))
      .mockRejectedValueOnce(new TransientFetchError('offline'));

    await widget.refresh();
    await widget.refresh();

    expect(widget.render(now)).toBe([
      '🔵 in 45m Planning',
      'Refresh failed: offline',
      'Updated 10:00  [enter] join  [r] refresh  [q] quit'
    ].join('\n'));
  });

  it('should replace the meeting with the error when it is not retryable', async () => {
    vi.spyOn(calendar, 'fetchSnapshot')
      .mockResolvedValueOnce(snapshotWith(planning))
      .mockRejectedValueOnce(new GraphApiError('ErrorAccessDenied', 'Access is denied.'));

    await widget.refresh();
    await widget.refresh();

    expect(widget.render(now)).toBe(
      'Error: API Error: ErrorAccessDenied - Access is denied.\nUpdated 10:00  [enter] join  [r] refresh  [q] quit'
    );
  });

  it('should point to the login command instead of opening a browser', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockRejectedValue(new AuthRequiredError());

    await widget.refresh();
    expect(widget.render(now)).toBe('Not signed in. Run: meeting-bar login\n[enter] join  [r] refresh  [q] quit');
  });

  it('should open the meeting on a left click', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(planning));
    const open = vi.spyOn(opener, 'open').mockResolvedValue(true);
    await widget.refresh();

    vi.setSystemTime(new Date('2025-01-20T10:44:00Z'));
    await widget.handleMouse(2);
    expect(open).not.toHaveBeenCalled();

    await widget.handleMouse(LEFT_BUTTON);
    expect(open).toHaveBeenCalledWith({ kind: 'web', url: 'https://outlook.office365.com/owa/?itemid=1' });
  });

  it('should not open anything for a meeting that is not imminent', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(planning));
    const open = vi.spyOn(opener, 'open');
    await widget.refresh();

    await widget.handleKey({ name: 'return' });

    expect(open).not.toHaveBeenCalled();
    expect(widget.render(now).split('\n')[1]).toBe('No meeting to join right now');
  });

  it('should open the meeting once it is about to start', async () => {
    vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(planning));
    const open = vi.spyOn(opener, 'open').mockResolvedValue(true);
    await widget.refresh();

    vi.setSystemTime(new Date('2025-01-20T10:42:00Z'));
    await widget.handleKey({ name: 'space' });

    expect(open).toHaveBeenCalledWith({ kind: 'web', url: 'https://outlook.office365.com/owa/?itemid=1' });
  });

  it('should refresh on r', async () => {
    const fetch = vi.spyOn(calendar, 'fetchSnapshot').mockResolvedValue(snapshotWith(null));

    await widget.handleKey({ name: 'r' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe('parseTerminalInput', () => {
  it('should read keys', () => {
    expect(parseTerminalInput(Buffer.from('q\r R'))).toEqual([
      { kind: 'key', key: { name: 'q' } },
      { kind: 'key', key: { name: 'return' } },
      { kind: 'key', key: { name: 'space' } },
      { kind: 'key', key: { name: 'r' } }
    ]);
    expect(parseTerminalInput(Buffer.from([0x03]))).toEqual([{ kind: 'key', key: { name: 'c', ctrl: true } }]);
  });

  it('should read a mouse press without leaking its bytes as keys', () => {
    // 左ボタン、列 10、行 3
    const press = Buffer.from([0x1b, 0x5b, 0x4d, 32, 32 + 10, 32 + 3]);
    expect(parseTerminalInput(press)).toEqual([{ kind: 'mouse', button: 0, x: 10, y: 3 }]);
  });

  it('should report releases and ignore wheel events', () => {
    const release = Buffer.from([0x1b, 0x5b, 0x4d, 32 + 3, 33, 33]);
    const wheel = Buffer.from([0x1b, 0x5b, 0x4d, 32 + 64, 33, 33]);
    expect(parseTerminalInput(release)).toEqual([{ kind: 'mouse', button: 3, x: 1, y: 1 }]);
    expect(parseTerminalInput(wheel)).toEqual([]);
  });

  it('should skip other escape sequences', () => {
    // 上矢印のあとに q
    expect(parseTerminalInput(Buffer.from('\x1B[Aq'))).toEqual([{ kind: 'key', key: { name: 'q' } }]);
  });
});
