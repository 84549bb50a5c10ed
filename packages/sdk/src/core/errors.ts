import type { ZodIssue } from 'zod';

export class PolicyDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyDecodeError';
  }
}

export class DeviceManagementError extends Error {
  readonly statusCode?: number;
  readonly responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message);
    this.name = 'DeviceManagementError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class ConfigError extends Error {
  readonly path?: string;
  readonly issues: ZodIssue[];

  constructor(message: string, options: { path?: string; issues?: ZodIssue[] } = {}) {
    super(message);
    this.name = 'ConfigError';
    this.path = options.path;
    this.issues = options.issues ?? [];
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
