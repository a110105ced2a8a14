/**
 * Query string parsing for the v1 API.
 *
 * Malformed values throw QueryParamError, which the routes turn into a 400.
 * Well-formed numbers outside the allowed range are clamped.
 */
import type { Response } from 'express';
import { logger } from '../../utils/logger.js';
import { parseNodeNum } from '../../utils/nodeHelpers.js';

export type QueryValues = Record<string, unknown>;

export class QueryParamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryParamError';
  }
}

interface NumberParamOptions {
  defaultValue: number;
  min?: number;
  max?: number;
  integer?: boolean;
}

function readString(query: QueryValues, name: string): string | undefined {
  const value = query[name];
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return typeof value === 'string' ? value : undefined;
}

export function parseStringParam(query: QueryValues, name: string): string | undefined {
  const value = readString(query, name)?.trim();
  return value ? value : undefined;
}

export function parseNumberParam(query: QueryValues, name: string, options: NumberParamOptions): number {
  const raw = parseStringParam(query, name);
  if (raw === undefined) {
    return options.defaultValue;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || (options.integer && !Number.isInteger(value))) {
    throw new QueryParamError(`${name} must be ${options.integer ? 'an integer' : 'a number'}`);
  }

  let clamped = value;
  if (options.min !== undefined) clamped = Math.max(options.min, clamped);
  if (options.max !== undefined) clamped = Math.min(options.max, clamped);
  return clamped;
}

export function parseBooleanParam(query: QueryValues, name: string, defaultValue: boolean): boolean {
  const raw = parseStringParam(query, name)?.toLowerCase();
  if (raw === undefined) {
    return defaultValue;
  }
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new QueryParamError(`${name} must be a boolean`);
}

/**
 * Node number from a query parameter, accepting decimal and `!hex` forms.
 */
export function parseNodeParam(query: QueryValues, name: string): number | undefined {
  const raw = parseStringParam(query, name);
  if (raw === undefined) {
    return undefined;
  }
  return requireNodeNum(raw, name);
}

/** Comma separated node numbers. */
export function parseNodeListParam(query: QueryValues, name: string): number[] | undefined {
  const raw = parseStringParam(query, name);
  if (raw === undefined) {
    return undefined;
  }
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => requireNodeNum(entry, name));
}

export function requireNodeNum(value: string, name: string): number {
  const nodeNum = parseNodeNum(value);
  if (nodeNum === null) {
    throw new QueryParamError(`${name} must be a node number or !hex node id, got "${value}"`);
  }
  return nodeNum;
}

/**
 * Send the error envelope for a failed request: 400 for bad parameters,
 * 500 for everything else.
 */
export function sendRouteError(res: Response, error: unknown, failureMessage: string): void {
  if (error instanceof QueryParamError) {
    res.status(400).json({
      success: false,
      error: 'Bad Request',
      message: error.message
    });
    return;
  }

  logger.error(`${failureMessage}:`, error);
  res.status(500).json({
    success: false,
    error: 'Internal Server Error',
    message: failureMessage
  });
}
