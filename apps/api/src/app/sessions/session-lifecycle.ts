import type { CheckInValidity, SessionState } from '@attendance/shared';
import type { DurationBounds } from '../common/config/attendance-settings';
import { addMinutes, laterOf } from '../common/utils/time.util';

export interface SessionWindow {
  startTime: Date;
  expiresAt: Date;
  endTime: Date | null;
  isOpen: boolean;
}

// State is computed from the clock; the isOpen flag alone never means "accepting".
export function sessionStateAt(window: SessionWindow, now: Date): SessionState {
  if (!window.isOpen) return 'CLOSED';
  return now.getTime() > window.expiresAt.getTime() ? 'EXPIRED' : 'OPEN';
}

export function isActive(window: SessionWindow, now: Date): boolean {
  return sessionStateAt(window, now) === 'OPEN';
}

export function validateForCheckIn(window: SessionWindow | null, now: Date): CheckInValidity {
  if (!window) return 'not_found';
  switch (sessionStateAt(window, now)) {
    case 'CLOSED':
      return 'closed';
    case 'EXPIRED':
      return 'expired';
    case 'OPEN':
      return 'ok';
  }
}

export function isDurationWithinBounds(minutes: number, bounds: DurationBounds): boolean {
  return Number.isInteger(minutes) && minutes >= bounds.min && minutes <= bounds.max;
}

export function openWindow(now: Date, durationMinutes: number): SessionWindow {
  return {
    startTime: now,
    expiresAt: addMinutes(now, durationMinutes),
    endTime: null,
    isOpen: true,
  };
}

/** An expired session is extended from now, not from its stale expiry. */
export function extendedExpiry(window: SessionWindow, now: Date, deltaMinutes: number): Date {
  return addMinutes(laterOf(window.expiresAt, now), deltaMinutes);
}

export function closeWindow<T extends SessionWindow>(window: T, now: Date): T {
  if (!window.isOpen) return window;
  return { ...window, isOpen: false, endTime: now };
}
