import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CalendarEvent } from '../types/calendar.js';
import { AuthRequiredError } from '../types/errors.js';
import { AuthService } from './auth.js';
import { CalendarService, createServices } from './calendar.js';
import { MgcService } from './mgc.js';

const now = new Date('2025-01-20T10:00:00Z');

const createMockEvent = (subject: string, startOffsetMinutes: number, endOffsetMinutes: number): CalendarEvent => ({
  id: subject,
  subject,
  start: new Date(now.getTime() + startOffsetMinutes * 60000),
  end: new Date(now.getTime() + endOffsetMinutes * 60000),
  location: '',
  webLink: '',
  teamsLink: '',
  isOnlineMeeting: false,
  organizer: '',
  attendees: [],
  body: '',
  isAllDay: false,
  showAs: 'busy'
});

describe('CalendarService', () => {
  let mgc: MgcService;
  let auth: AuthService;
  let calendar: CalendarService;

  beforeEach(() => {
    mgc = new MgcService({ run: vi.fn(), runInteractive: vi.fn() });
    auth = new AuthService(mgc, 'Calendars.Read');
    calendar = new CalendarService(mgc, auth, 3);
  });

  it('should fetch events and select the best one', async () => {
    const ensure = vi.spyOn(auth, 'ensureAuthenticated').mockResolvedValue();
    const later = createMockEvent('Later', 60, 90);
    const soon = createMockEvent('Soon', 10, 40);
    const upcoming = vi.spyOn(mgc, 'getUpcomingEvents').mockResolvedValue([later, soon]);
    vi.spyOn(mgc, 'getTodaysEvents').mockResolvedValue([soon, later]);

    const snapshot = await calendar.fetchSnapshot({ allowInteractive: false }, now);

    expect(ensure).toHaveBeenCalledWith({ allowInteractive: false });
    expect(upcoming).toHaveBeenCalledWith(3, now);
    expect(snapshot).toEqual({
      fetchedAt: now,
      upcomingEvents: [later, soon],
      todaysEvents: [soon, later],
      selected: soon
    });
  });

  it('should keep going when today\'s events cannot be fetched', async () => {
    vi.spyOn(auth, 'ensureAuthenticated').mockResolvedValue();
    vi.spyOn(mgc, 'getUpcomingEvents').mockResolvedValue([]);
    vi.spyOn(mgc, 'getTodaysEvents').mockRejectedValue(new Error('timeout'));

    const snapshot = await calendar.fetchSnapshot({ allowInteractive: false }, now);
    expect(snapshot.todaysEvents).toEqual([]);
    expect(snapshot.selected).toBeNull();
  });

  it('should not fetch when authentication fails', async () => {
    vi.spyOn(auth, 'ensureAuthenticated').mockRejectedValue(new AuthRequiredError());
    const upcoming = vi.spyOn(mgc, 'getUpcomingEvents');

    await expect(calendar.fetchSnapshot({ allowInteractive: false }, now)).rejects.toBeInstanceOf(AuthRequiredError);
    expect(upcoming).not.toHaveBeenCalled();
  });

  it('should wire services from configuration', () => {
    const services = createServices({
      refreshInterval: 60,
      requestTimeoutSeconds: 10,
      compact: false,
      scopes: 'Calendars.Read',
      upcomingDays: 7,
      maxUpcomingInTooltip: 5
    });
    expect(services.calendar).toBeInstanceOf(CalendarService);
    expect(services.auth).toBeInstanceOf(AuthService);
  });
});
