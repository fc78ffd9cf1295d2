// src/api/validation.ts
// Guards that turn untyped request input into typed values or a ValidationError.
import { Request } from 'express';
import { ATTACHMENT_TYPES, Attachment } from '../models/message.types';
import { ValidationError } from '../utils/errors';
import { isOneOf, isRecord, isWholeCents } from '../utils/guards';

export type Body = Record<string, unknown>;
type Query = Request['query'];

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 500;
const MAX_TEXT_LENGTH = 2000;

export const requireBody = (value: unknown): Body => {
  if (!isRecord(value)) {
    throw new ValidationError('Request body must be a JSON object.');
  }
  return value;
};

export const requireString = (body: Body, field: string, options: { allowEmpty?: boolean } = {}): string => {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} is required and must be a string.`);
  }
  const trimmed = value.trim();
  if (!options.allowEmpty && trimmed === '') {
    throw new ValidationError(`${field} must not be empty.`);
  }
  if (trimmed.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(`${field} must be at most ${MAX_TEXT_LENGTH} characters long.`);
  }
  return trimmed;
};

/** Absent stays undefined; null or a blank string clears the field. */
export const optionalString = (body: Body, field: string): string | null | undefined => {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string or null.`);
  }
  const trimmed = value.trim();
  if (trimmed.length > MAX_TEXT_LENGTH) {
    throw new ValidationError(`${field} must be at most ${MAX_TEXT_LENGTH} characters long.`);
  }
  return trimmed === '' ? null : trimmed;
};

const toAmount = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number.`);
  }
  if (value <= 0) {
    throw new ValidationError(`${field} must be greater than zero.`);
  }
  // Sums run in cents, so anything finer than 0.01 would be lost.
  if (value < 0.01 || !isWholeCents(value)) {
    throw new ValidationError(`${field} must be a whole number of cents.`);
  }
  return value;
};

export const requireAmount = (body: Body, field = 'amount'): number => toAmount(body[field], field);

export const optionalAmount = (body: Body, field = 'amount'): number | undefined =>
  body[field] === undefined ? undefined : toAmount(body[field], field);

export const requireOneOf = <T extends string>(values: readonly T[], body: Body, field: string): T => {
  const value = body[field];
  if (!isOneOf(values, value)) {
    throw new ValidationError(`${field} must be one of: ${values.join(', ')}.`);
  }
  return value;
};

export const optionalOneOf = <T extends string>(values: readonly T[], body: Body, field: string): T | undefined =>
  body[field] === undefined ? undefined : requireOneOf(values, body, field);

/** Accepts epoch milliseconds or an ISO 8601 date / date-time string. */
export const toTimestamp = (value: unknown, field: string): number => {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  throw new ValidationError(`${field} must be an ISO 8601 date or epoch milliseconds.`);
};

export const optionalTimestamp = (body: Body, field: string): number | null | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return value;
  }
  return toTimestamp(value, field);
};

export const optionalBoolean = (body: Body, field: string): boolean | undefined => {
  const value = body[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean.`);
  }
  return value;
};

export const optionalRecord = (body: Body, field: string): Record<string, unknown> | null | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return value;
  }
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be an object.`);
  }
  return value;
};

export const optionalArray = (body: Body, field: string): unknown[] | null | undefined => {
  const value = body[field];
  if (value === undefined || value === null) {
    return value;
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array.`);
  }
  return value;
};

export const optionalRecordArray = (body: Body, field: string): Record<string, unknown>[] | null | undefined => {
  const items = optionalArray(body, field);
  if (items === undefined || items === null) {
    return items;
  }
  return items.map((item, index) => {
    if (!isRecord(item)) {
      throw new ValidationError(`${field}[${index}] must be an object.`);
    }
    return item;
  });
};

/** One `{id, type, mimeType, dataUrl, name?, durationMs?}` item of an attachments array. */
export const parseAttachment = (item: Body, index: number): Attachment => {
  const attachment: Attachment = {
    id: requireString(item, 'id'),
    type: requireOneOf(ATTACHMENT_TYPES, item, 'type'),
    mimeType: requireString(item, 'mimeType'),
    dataUrl: typeof item.dataUrl === 'string' ? item.dataUrl : '',
  };
  if (attachment.dataUrl === '') {
    throw new ValidationError(`attachments[${index}].dataUrl is required.`);
  }
  const name = optionalString(item, 'name');
  if (name) {
    attachment.name = name;
  }
  if (item.durationMs !== undefined && item.durationMs !== null) {
    if (typeof item.durationMs !== 'number' || !Number.isInteger(item.durationMs) || item.durationMs < 0) {
      throw new ValidationError(`attachments[${index}].durationMs must be a non-negative integer.`);
    }
    attachment.durationMs = item.durationMs;
  }
  return attachment;
};

export const queryString = (query: Query, name: string): string | undefined => {
  const value = query[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`Query parameter ${name} must be given once.`);
  }
  return value.trim() === '' ? undefined : value.trim();
};

export const queryBoolean = (query: Query, name: string): boolean | undefined => {
  const value = queryString(query, name);
  if (value === undefined) {
    return undefined;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw new ValidationError(`Query parameter ${name} must be true or false.`);
};

export const queryOneOf = <T extends string>(values: readonly T[], query: Query, name: string): T | undefined => {
  const value = queryString(query, name);
  if (value === undefined) {
    return undefined;
  }
  if (!isOneOf(values, value)) {
    throw new ValidationError(`Query parameter ${name} must be one of: ${values.join(', ')}.`);
  }
  return value;
};

const queryInteger = (query: Query, name: string, fallback: number, min: number, max: number): number => {
  const raw = queryString(query, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`Query parameter ${name} must be an integer between ${min} and ${max}.`);
  }
  return value;
};

export const parsePagination = (query: Query): { skip: number; limit: number } => ({
  skip: queryInteger(query, 'skip', 0, 0, Number.MAX_SAFE_INTEGER),
  limit: queryInteger(query, 'limit', DEFAULT_LIMIT, 1, MAX_LIMIT),
});
