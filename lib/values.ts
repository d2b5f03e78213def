'use strict';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function getFirstStringValue(record: JsonRecord, keys: string[]): string | null {
  for (const key of keys) {
    const value = record[key];

    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }

  return null;
}

export function tryParseJson(candidate: string): unknown | undefined {
  try {
    return JSON.parse(candidate);
  } catch (error) {
    return undefined;
  }
}

export function looksLikeMac(input: string): boolean {
  return /^[0-9a-fA-F]{2}([:-]?[0-9a-fA-F]{2}){5}$/.test(input);
}

export function safeNormalizeMac(input: unknown): string | null {
  if (typeof input !== 'string' || !looksLikeMac(input.trim())) {
    return null;
  }

  const cleaned = input.replace(/[^a-fA-F0-9]/g, '').toUpperCase();
  return cleaned.replace(/(..)(?!$)/g, '$1:');
}

/**
 * Counters and uptimes come back as numbers on most firmware and as decimal
 * strings on some. Anything else, including negatives and fractions, is
 * rejected.
 */
export function toNonNegativeInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }

  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : null;
  }

  return null;
}

export function cleanText(value: unknown, maxLength: number): string {
  return String(value ?? '').trim().slice(0, maxLength);
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);

  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return Math.min(max, Math.max(min, Math.round(parsed)));
}
