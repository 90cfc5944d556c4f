import { DocumentData } from '../data/document-store';

/**
 * Accepts epoch millis, Firestore `Timestamp`s and `{ seconds }` literals
 * written by older clients.
 */
export function toMillis(value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (value instanceof Date) return value.getTime();
  if (typeof value !== 'object') return undefined;
  if ('toMillis' in value && typeof value.toMillis === 'function') {
    const millis: unknown = value.toMillis();
    return typeof millis === 'number' ? millis : undefined;
  }
  if ('seconds' in value && typeof value.seconds === 'number') {
    return value.seconds * 1000;
  }
  return undefined;
}

export function readString(data: DocumentData, field: string, fallback = ''): string {
  const value = data[field];
  return typeof value === 'string' ? value : fallback;
}

export function readOptionalString(data: DocumentData, field: string): string | undefined {
  const value = data[field];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function readBoolean(data: DocumentData, field: string): boolean {
  return data[field] === true;
}

export function readStringArray(data: DocumentData, field: string): string[] {
  const value = data[field];
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function readMap<T>(data: DocumentData, field: string, pick: (value: unknown) => T | undefined): Record<string, T> {
  const value = data[field];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  const result: Record<string, T> = {};
  for (const [key, entry] of Object.entries(value)) {
    const picked = pick(entry);
    if (picked !== undefined) result[key] = picked;
  }
  return result;
}

export function readStringMap(data: DocumentData, field: string): Record<string, string> {
  return readMap(data, field, value => (typeof value === 'string' ? value : undefined));
}

export function readNumberMap(data: DocumentData, field: string): Record<string, number> {
  return readMap(data, field, value => (typeof value === 'number' ? value : undefined));
}

export function readMillisMap(data: DocumentData, field: string): Record<string, number> {
  return readMap(data, field, toMillis);
}
