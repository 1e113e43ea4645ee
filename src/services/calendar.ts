import chalk from 'chalk';
import { CalendarEvent } from '../types/calendar.js';
import { getErrorMessage } from '../types/errors.js';
import { Config } from '../utils/config.js';
import { selectBestEvent } from '../utils/selector.js';
import { AuthService, EnsureAuthOptions } from './auth.js';
import { MgcService } from './mgc.js';

export interface CalendarSnapshot {
  fetchedAt: Date;
  upcomingEvents: CalendarEvent[];
  todaysEvents: CalendarEvent[];
  selected: CalendarEvent | null;
}

/**
 * 1回のポーリングで必要なデータをまとめて取得する
 */
export class CalendarService {
  constructor(
    private readonly mgc: MgcService,
    private readonly auth: AuthService,
    private readonly upcomingDays: number = 7
  ) {}

  async fetchSnapshot(authOptions: EnsureAuthOptions, now: Date = new Date()): Promise<CalendarSnapshot> {
    await this.auth.ensureAuthenticated(authOptions);

    const upcomingEvents = await this.mgc.getUpcomingEvents(this.upcomingDays, now);

    // 今日の予定はツールチップ用なので、失敗しても表示は続ける
    let todaysEvents: CalendarEvent[] = [];
    try {
      todaysEvents = await this.mgc.getTodaysEvents(now);
    } catch (error) {
      console.error(chalk.yellow(`Failed to fetch today's events: ${getErrorMessage(error)}`));
    }

    return {
      fetchedAt: now,
      upcomingEvents,
      todaysEvents,
      selected: selectBestEvent(upcomingEvents, now),
    };
  }
}

export interface Services {
  mgc: MgcService;
  auth: AuthService;
  calendar: CalendarService;
}

export function createServices(config: Config): Services {
  const mgc = new MgcService({ timeoutMs: config.requestTimeoutSeconds * 1000 });
  const auth = new AuthService(mgc, config.scopes);
  const calendar = new CalendarService(mgc, auth, config.upcomingDays);
  return { mgc, auth, calendar };
}
