import { z } from 'zod';

import type { LogLevel } from './types/runtime.js';

export interface IntegerRange {
  min?: number;
  max?: number;
}

const logLevelSchema = z
  .enum(['debug', 'info', 'warn', 'error'])
  .catch('info' satisfies LogLevel);

const FALSE_VALUES: ReadonlySet<string> = new Set(['false', '0', 'no', 'off']);

function present(envValue: string | undefined): string | undefined {
  const trimmed = envValue?.trim();
  return trimmed ? trimmed : undefined;
}

function integerSchema({ min, max }: IntegerRange): z.ZodNumber {
  let schema = z.coerce.number().int();
  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);
  return schema;
}

/** Whole numbers only; anything unparsable or outside `range` gives the default. */
export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  range: IntegerRange = {}
): number {
  const value = present(envValue);
  if (value === undefined) return defaultValue;
  const result = integerSchema(range).safeParse(value);
  return result.success ? result.data : defaultValue;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  const value = present(envValue);
  if (value === undefined) return defaultValue;
  return !FALSE_VALUES.has(value.toLowerCase());
}

export function parseString(
  envValue: string | undefined,
  defaultValue: string
): string {
  return present(envValue) ?? defaultValue;
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  return logLevelSchema.parse(present(envValue)?.toLowerCase());
}
