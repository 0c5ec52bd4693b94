/**
 * Argument schemas and their advertised JSON counterparts, shared across tools
 */

import { z } from 'zod';
import { env } from '../../config/env';
import { JsonSchemaProperty } from './tools.types';

export const urlArg = z.string().min(1);
export const headlessArg = z.boolean().default(env.HEADLESS);

export function secondsArg(fallback: number) {
  return z.number().positive().default(fallback);
}

export function delayArg(fallback: number) {
  return z.number().min(0).default(fallback);
}

export function countArg(fallback: number) {
  return z.number().int().min(1).default(fallback);
}

/**
 * Integer argument quietly capped at `max`
 */
export function cappedCountArg(fallback: number, max: number) {
  return countArg(fallback).transform((value) => Math.min(value, max));
}

export const urlParam: JsonSchemaProperty = {
  type: 'string',
  description: 'Absolute URL including http:// or https://',
};

export const headlessParam: JsonSchemaProperty = {
  type: 'boolean',
  description: 'Run the browser without a visible window',
  default: env.HEADLESS,
};

export function secondsParam(description: string, fallback: number): JsonSchemaProperty {
  return { type: 'number', description, default: fallback, exclusiveMinimum: 0 };
}

/** Like `secondsParam`, but zero is allowed */
export function delayParam(description: string, fallback: number): JsonSchemaProperty {
  return { type: 'number', description, default: fallback, minimum: 0 };
}

export function countParam(description: string, fallback: number, maximum?: number): JsonSchemaProperty {
  return { type: 'integer', description, default: fallback, minimum: 1, ...(maximum !== undefined && { maximum }) };
}
