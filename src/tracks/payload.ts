/**
 * Validation of untyped action payloads.
 *
 * Payloads reach the engine as parsed JSON. Each reader narrows one field and
 * throws a MALFORMED_PAYLOAD error naming the field on mismatch.
 *
 * @packageDocumentation
 */

import type { Metadata, TrackName } from '../feature/types.js';
import { TrackOperationError } from './errors.js';

/**
 * A payload that has been checked to be a JSON object.
 */
export interface PayloadReader {
  readonly track: TrackName;
  readonly fields: Readonly<Record<string, unknown>>;
}

function malformed(track: TrackName, message: string): TrackOperationError {
  return new TrackOperationError('MALFORMED_PAYLOAD', track, message);
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks that a payload is an object. An absent payload reads as `{}`.
 *
 * @param track - Track the payload is for.
 * @param payload - Raw payload.
 * @returns A reader over the payload's fields.
 */
export function readPayload(track: TrackName, payload: unknown): PayloadReader {
  if (payload === undefined || payload === null) {
    return { track, fields: {} };
  }
  if (!isPlainObject(payload)) {
    throw malformed(track, `Payload must be an object, got ${describe(payload)}`);
  }
  return { track, fields: payload };
}

export function requireString(reader: PayloadReader, field: string): string {
  const value = reader.fields[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw malformed(reader.track, `Field '${field}' must be a non-empty string, got ${describe(value)}`);
  }
  return value;
}

export function optionalString(reader: PayloadReader, field: string): string | null {
  const value = reader.fields[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw malformed(reader.track, `Field '${field}' must be a string, got ${describe(value)}`);
  }
  return value;
}

export function requireNumber(reader: PayloadReader, field: string): number {
  const value = reader.fields[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw malformed(reader.track, `Field '${field}' must be a number, got ${describe(value)}`);
  }
  return value;
}

export function optionalNumber(reader: PayloadReader, field: string): number | null {
  const value = reader.fields[field];
  if (value === undefined || value === null) {
    return null;
  }
  return requireNumber(reader, field);
}

export function requireBoolean(reader: PayloadReader, field: string): boolean {
  const value = reader.fields[field];
  if (typeof value !== 'boolean') {
    throw malformed(reader.track, `Field '${field}' must be a boolean, got ${describe(value)}`);
  }
  return value;
}

export function optionalBoolean(reader: PayloadReader, field: string, fallback: boolean): boolean {
  return reader.fields[field] === undefined ? fallback : requireBoolean(reader, field);
}

/**
 * Reads a field restricted to a set of string values.
 *
 * @param reader - Payload reader.
 * @param field - Field name.
 * @param allowed - Accepted values.
 * @param fallback - Value used when the field is absent; omit to require it.
 * @returns The narrowed value.
 */
export function requireOneOf<T extends string>(
  reader: PayloadReader,
  field: string,
  allowed: readonly T[],
  fallback?: T
): T {
  const value = reader.fields[field];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw malformed(
      reader.track,
      `Field '${field}' must be one of ${allowed.join(', ')}, got ${typeof value === 'string' ? `'${value}'` : describe(value)}`
    );
  }
  return match;
}

export function optionalObject(reader: PayloadReader, field: string): Metadata | null {
  const value = reader.fields[field];
  if (value === undefined || value === null) {
    return null;
  }
  if (!isPlainObject(value)) {
    throw malformed(reader.track, `Field '${field}' must be an object, got ${describe(value)}`);
  }
  return value;
}

export function optionalStringList(reader: PayloadReader, field: string): string[] {
  const value = reader.fields[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw malformed(reader.track, `Field '${field}' must be a list of strings, got ${describe(value)}`);
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw malformed(reader.track, `Field '${field}[${String(index)}]' must be a string`);
    }
    return item;
  });
}
