import type { Clock } from '../utils/clock';
import type { AttendanceSettings } from './attendance-settings';

export function testSettings(overrides: Partial<AttendanceSettings> = {}): AttendanceSettings {
  return {
    authMode: 'manual',
    oauthUserinfoUrl: null,
    emailDomain: '@uni.test',
    adminEmails: new Set(['dean@uni.test']),
    instructorEmails: new Set(['prof@uni.test']),
    secretaryEmails: new Set(['office@uni.test']),
    sessionDefaultMinutes: 15,
    sessionDuration: { min: 5, max: 240 },
    sessionExtendMinutes: 10,
    tokenIssueAttempts: 3,
    publicBaseUrl: 'https://attendance.uni.test',
    reportTimeZone: 'Europe/Athens',
    displayTimeZone: 'UTC',
    ...overrides,
  };
}

/** A clock tests can move by hand. */
export class FakeClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date | string) {
    this.current = new Date(instant);
  }

  advanceMinutes(minutes: number) {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}
