import { ConfigService } from '@nestjs/config';
import { normalizeEmail } from '../utils/names.util';
import { isValidTimeZone } from '../utils/time.util';

export const ATTENDANCE_SETTINGS = Symbol('ATTENDANCE_SETTINGS');

export type AuthMode = 'manual' | 'proxy' | 'oauth';

export interface DurationBounds {
  min: number;
  max: number;
}

export interface AttendanceSettings {
  readonly authMode: AuthMode;
  readonly oauthUserinfoUrl: string | null;
  readonly emailDomain: string;
  readonly adminEmails: ReadonlySet<string>;
  readonly instructorEmails: ReadonlySet<string>;
  readonly secretaryEmails: ReadonlySet<string>;
  readonly sessionDefaultMinutes: number;
  readonly sessionDuration: DurationBounds;
  readonly sessionExtendMinutes: number;
  readonly tokenIssueAttempts: number;
  readonly publicBaseUrl: string;
  readonly reportTimeZone: string;
  readonly displayTimeZone: string;
}

export function parseEmailList(raw: string | undefined): Set<string> {
  return new Set(
    String(raw ?? '')
      .split(',')
      .map((email) => normalizeEmail(email))
      .filter(Boolean)
  );
}

function normalizeDomain(raw: string) {
  const domain = raw.trim().toLowerCase();
  return domain.startsWith('@') ? domain : `@${domain}`;
}

function toAuthMode(raw: string): AuthMode {
  const mode = raw.trim().toLowerCase();
  if (mode === 'manual' || mode === 'proxy' || mode === 'oauth') return mode;
  throw new Error(`Unsupported AUTH_MODE "${raw}"`);
}

export function loadAttendanceSettings(config: ConfigService): AttendanceSettings {
  const num = (key: string, fallback: number) =>
    Number(config.get<string>(key, String(fallback)));

  const settings: AttendanceSettings = {
    authMode: toAuthMode(config.get<string>('AUTH_MODE', 'manual')),
    oauthUserinfoUrl: config.get<string>('OAUTH_USERINFO_URL')?.trim() || null,
    emailDomain: normalizeDomain(config.get<string>('EMAIL_DOMAIN', '@university.edu')),
    adminEmails: parseEmailList(config.get<string>('ADMIN_EMAILS')),
    instructorEmails: parseEmailList(config.get<string>('INSTRUCTOR_EMAILS')),
    secretaryEmails: parseEmailList(config.get<string>('SECRETARY_EMAILS')),
    sessionDefaultMinutes: num('SESSION_DEFAULT_MINUTES', 15),
    sessionDuration: {
      min: num('SESSION_MIN_MINUTES', 5),
      max: num('SESSION_MAX_MINUTES', 240),
    },
    sessionExtendMinutes: num('SESSION_EXTEND_MINUTES', 10),
    tokenIssueAttempts: num('TOKEN_ISSUE_ATTEMPTS', 3),
    publicBaseUrl: config
      .get<string>('PUBLIC_BASE_URL', 'http://localhost:8080')
      .replace(/\/+$/, ''),
    reportTimeZone: config.get<string>('REPORT_TIME_ZONE', 'Europe/Athens'),
    displayTimeZone: config.get<string>('DISPLAY_TIME_ZONE', 'UTC'),
  };

  const { min, max } = settings.sessionDuration;
  if (min > max) {
    throw new Error('SESSION_MIN_MINUTES must not exceed SESSION_MAX_MINUTES');
  }
  if (settings.sessionDefaultMinutes < min || settings.sessionDefaultMinutes > max) {
    throw new Error(`SESSION_DEFAULT_MINUTES must be within ${min}-${max}`);
  }
  for (const zone of [settings.reportTimeZone, settings.displayTimeZone]) {
    if (!isValidTimeZone(zone)) throw new Error(`Unknown time zone "${zone}"`);
  }
  if (settings.authMode === 'oauth' && !settings.oauthUserinfoUrl) {
    throw new Error('OAUTH_USERINFO_URL is required when AUTH_MODE=oauth');
  }
  return settings;
}
