import { randomUUID } from 'crypto';

export function generateId(): string {
  return randomUUID();
}

export function now(): number {
  return Date.now();
}

export function parseJsonObject(raw: string | null | undefined): Record<string, unknown> {
  if (raw == null) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? { ...parsed } : {};
  } catch {
    return {};
  }
}
