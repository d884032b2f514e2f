/**
 * Time utilities for consistent date handling
 */

import { format } from 'date-fns';

export function formatTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

/** Run ids sort chronologically: `20260114_093005` */
export function getRunId(date: Date = new Date()): string {
  return format(date, 'yyyyMMdd_HHmmss');
}

export function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
