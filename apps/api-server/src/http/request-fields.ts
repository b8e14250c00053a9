import { ValidationError } from '@activityhub/core-domain';
import type { Context } from 'hono';

const FORM_CONTENT_TYPES = ['multipart/form-data', 'application/x-www-form-urlencoded'];

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Reads a JSON, multipart or urlencoded body into a plain field map for the zod parsers. Form
 * fields that carry files or repeat are dropped.
 */
export const readRequestFields = async (c: Context): Promise<Record<string, unknown>> => {
  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';

  if (FORM_CONTENT_TYPES.some((formType) => contentType.startsWith(formType))) {
    const body = await c.req.parseBody();
    const fields: Record<string, unknown> = {};

    for (const [name, value] of Object.entries(body)) {
      if (typeof value === 'string') {
        fields[name] = value;
      }
    }

    return fields;
  }

  let payload: unknown;

  try {
    payload = await c.req.json<unknown>();
  } catch {
    throw new ValidationError('Request body must be valid JSON', [
      {
        path: '',
        message: 'Malformed JSON',
      },
    ]);
  }

  if (!isRecord(payload)) {
    throw new ValidationError('Request body must be a JSON object', [
      {
        path: '',
        message: 'Expected an object',
      },
    ]);
  }

  return payload;
};
