import { ValidationError } from '../errors/index.js';
import type { ApiResult } from '../types/common.js';

/**
 * Largest page the broker returns for list endpoints
 */
export const MAX_COUNT = 500;
export const DEFAULT_COUNT = 50;

/**
 * Paging and filter options shared by the list endpoints
 */
export interface ListQuery {
  /** Number of records, default 50; anything above 500 is sent as 500 */
  count?: number;
  /** Restrict to one instrument, XXX_YYY */
  instrument?: string;
}

export function clampCount(count: number = DEFAULT_COUNT): number {
  return count > MAX_COUNT ? MAX_COUNT : count;
}

/**
 * `count=<n>[&instrument=<i>]`
 */
export function buildListQuery(query: ListQuery = {}): string {
  let search = `count=${clampCount(query.count)}`;
  if (query.instrument) {
    search += `&instrument=${encodeURIComponent(query.instrument)}`;
  }
  return search;
}

/**
 * Encode one path segment
 */
export function segment(value: string | number): string {
  return encodeURIComponent(String(value));
}

/**
 * Base path for everything scoped to the configured account
 */
export function accountPath(accountId: string): string {
  return `/v1/accounts/${segment(accountId)}`;
}

const DOT_SEGMENTS = new Set(['.', '..']);

/**
 * Check an identifier supplied by the caller; returns the rejection to hand back, if any
 */
export function checkId(value: string | number, field: string): ValidationError | null {
  const text = String(value).trim();
  if (text === '') {
    return new ValidationError(`${field} is required`, [{ field, message: `${field} must not be empty` }], field);
  }
  // URL parsing collapses `.` and `..` segments, even percent-encoded
  if (DOT_SEGMENTS.has(text)) {
    return new ValidationError(
      `${field} must not be "${text}"`,
      [{ field, message: `${field} must not be a dot segment` }],
      field
    );
  }
  return null;
}

/**
 * Result for a call rejected before anything was sent
 */
export function rejected(error: ValidationError): ApiResult<never> {
  return { success: false, status: null, error };
}
