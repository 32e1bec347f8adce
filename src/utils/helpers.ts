/**
 * Prism - Utility Helper Functions
 * Small helpers shared across the pipeline and the HTTP surface
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique identifier (request ids, run ids, evidence pack ids)
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Render a calendar date as YYYY-MM-DD using local date parts
 */
export function formatIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Shift a date by whole calendar days
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Extract a message from anything thrown
 */
export function toErrorMessage(error: unknown): string {
  // Driver errors may come from another realm and fail instanceof Error
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Get client IP from forwarding headers
 */
export function getClientIp(headers: Record<string, string | string[] | undefined>): string {
  const forwardedFor = headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips?.split(',')[0]?.trim() ?? 'unknown';
  }

  const realIp = headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? (realIp[0] ?? 'unknown') : realIp;
  }

  return 'unknown';
}
