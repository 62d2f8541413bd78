import mongoose from 'mongoose';
import { isPlainObject } from '../utils/isPlainObject';

// `required` on strings means present and not null; an empty string is a value.
mongoose.Schema.Types.String.checkRequired((value: unknown) => typeof value === 'string');

export interface FieldIssue {
  field: string;
  kind: string;
  message: string;
}

/** Element type a list path must hold, checked on the raw payload. */
export type ListShape = 'string' | 'object';

const isString = (value: unknown): value is string => typeof value === 'string';

/**
 * Accepts only JSON objects as entity payloads; anything else fails the same
 * way a schema violation does, under the pseudo-field `body`.
 */
export const asPayload = (input: unknown): Record<string, unknown> => {
  if (isPlainObject(input)) return input;

  const error = new mongoose.Error.ValidationError();
  error.addError(
    'body',
    new mongoose.Error.ValidatorError({
      path: 'body',
      type: 'object',
      message: 'Request body must be a JSON object',
      value: input,
    }),
  );
  throw error;
};

const listMessage = (path: string, shape: ListShape, value: unknown): string | null => {
  if (!Array.isArray(value)) return `${path} must be a list`;
  const matches = shape === 'string' ? isString : isPlainObject;
  return value.every(matches) ? null : `${path} entries must be ${shape}s`;
};

/**
 * Runs the schema validators, then checks list paths against the payload as
 * sent: Mongoose would otherwise wrap a scalar in an array, cast numbers to
 * strings, or keep `null` in place of a list.
 */
export const assertValid = (
  doc: mongoose.Document,
  payload: Record<string, unknown>,
  lists: Readonly<Record<string, ListShape>> = {},
): void => {
  const error = doc.validateSync() ?? new mongoose.Error.ValidationError();

  for (const [path, shape] of Object.entries(lists)) {
    const value = payload[path];
    if (value === undefined) continue;

    const message = listMessage(path, shape, value);
    if (message === null) continue;

    for (const field of Object.keys(error.errors)) {
      if (field === path || field.startsWith(`${path}.`)) delete error.errors[field];
    }
    error.addError(path, new mongoose.Error.ValidatorError({ path, type: 'array', message, value }));
  }

  if (Object.keys(error.errors).length > 0) throw error;
};

export const listIssues = (error: mongoose.Error.ValidationError): FieldIssue[] =>
  Object.entries(error.errors)
    .map(([field, issue]) => ({ field, kind: issue.kind, message: issue.message }))
    .sort((a, b) => a.field.localeCompare(b.field));

export const integer = {
  validator: (value: unknown) => value == null || Number.isInteger(value),
  message: '{PATH} must be an integer',
};
