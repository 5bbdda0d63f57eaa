import type { IncomingMessage, ServerResponse } from 'node:http';
import type { z } from 'zod';
import { TaskdeckError, ValidationError, errorCodeFor, errorMessage, httpStatusFor } from '../../errors.js';

const MAX_BODY_BYTES = 1_048_576;

export function json(res: ServerResponse, statusCode: number, payload: unknown): void {
  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json');
  res.end(`${JSON.stringify(payload)}\n`);
}

export function sendError(res: ServerResponse, error: unknown): void {
  const status = httpStatusFor(error);
  json(res, status, {
    ok: false,
    error: {
      code: errorCodeFor(error),
      message: status === 500 && !(error instanceof TaskdeckError) ? 'Internal server error' : errorMessage(error)
    }
  });
}

export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new ValidationError('Request body too large');
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw.trim()) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(issues);
  }
  return result.data;
}

export async function readInput<T>(req: IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  return parseInput(schema, await readJsonBody(req));
}
