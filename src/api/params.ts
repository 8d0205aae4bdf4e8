/**
 * Query-string and path helpers for GET handlers.
 */

import { ValidationError } from '../errors.js';

export function requireParam(url: URL, name: string): string {
  const value = url.searchParams.get(name)?.trim();
  if (!value) throw new ValidationError(`${name} is required`);
  return value;
}

export function optionalParam(url: URL, name: string): string | undefined {
  const value = url.searchParams.get(name)?.trim();
  return value ? value : undefined;
}

export function intParam(url: URL, name: string): number | undefined {
  const raw = optionalParam(url, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer`, { [name]: raw });
  }
  return value;
}

export function enumParam<T extends string>(
  url: URL,
  name: string,
  allowed: readonly T[]
): T | undefined {
  const raw = optionalParam(url, name);
  if (raw === undefined) return undefined;

  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new ValidationError(`${name} must be one of: ${allowed.join(', ')}`, { [name]: raw });
  }
  return match;
}

/** Last path segment, URL-decoded. */
export function lastSegment(url: URL): string {
  const parts = url.pathname.split('/').filter(Boolean);
  return decodeURIComponent(parts[parts.length - 1] ?? '');
}
