import type { AuthIdentity } from '@attendance/shared';

export type ResolvedIdentity = AuthIdentity;

export const ANONYMOUS: ResolvedIdentity = Object.freeze({ email: null, name: null });

// Minimal view of the incoming request; express requests satisfy it.
export interface IdentityRequest {
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, unknown>;
}

export interface IdentityResolver {
  resolve(req: IdentityRequest): Promise<ResolvedIdentity>;
}

export const IDENTITY_RESOLVER = Symbol('IDENTITY_RESOLVER');

export function firstHeader(req: IdentityRequest, names: readonly string[]): string {
  for (const name of names) {
    const raw = req.headers[name.toLowerCase()];
    const value = String((Array.isArray(raw) ? raw[0] : raw) ?? '').trim();
    if (value) return value;
  }
  return '';
}

export function queryText(req: IdentityRequest, key: string): string {
  const raw = req.query[key];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' ? value.trim() : '';
}
