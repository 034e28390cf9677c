// -----------------------------------------------------------------------------
// Shared Utilities - filesystem and naming helpers
// -----------------------------------------------------------------------------

import { mkdir } from 'fs/promises';

/**
 * Keeps word characters, whitespace and hyphens, turns whitespace runs into
 * underscores and trims leading/trailing underscores.
 */
export function sanitizeFilename(text: string, maxLength: number = 50): string {
  return text
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/\s+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, maxLength);
}

/** `YYYYMMDD_HHMMSS` in local time */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function pageImageFilename(pageNumber: number, extension: string = 'png'): string {
  return `page_${String(pageNumber).padStart(2, '0')}.${extension}`;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
