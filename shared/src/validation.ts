/**
 * Input Validation Utilities
 * Shared validation helpers for all plugins
 */

import type { z } from 'zod';

/**
 * Validates a port number
 */
export function validatePort(value: string | number | undefined, defaultPort: number): number {
  const port = typeof value === 'string' ? parseInt(value, 10) : (value ?? defaultPort);
  if (isNaN(port) || port < 0 || port > 65535) {
    return defaultPort;
  }
  return port;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function parseCsvList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join(', ');
}
