import { describe, expect, test } from 'vitest';
import {
  ForbiddenError,
  InvalidTransitionError,
  NotFoundError,
  TaskdeckError,
  TransientError,
  ValidationError,
  errorCodeFor,
  errorMessage,
  httpStatusFor,
} from '../src/errors.js';

describe('errors', () => {
  test('formats domain messages', () => {
    expect(new NotFoundError('Thread', 't1').message).toBe('Thread not found: t1');
    expect(new InvalidTransitionError('Package', 'installed', 'approve').message).toBe(
      'Cannot approve Package in state installed'
    );
  });

  test('maps codes to http statuses', () => {
    expect(httpStatusFor(new NotFoundError('Task', 'x'))).toBe(404);
    expect(httpStatusFor(new InvalidTransitionError('Task', 'queued', 'complete'))).toBe(409);
    expect(httpStatusFor(new ForbiddenError('no'))).toBe(403);
    expect(httpStatusFor(new ValidationError('bad'))).toBe(400);
    expect(httpStatusFor(new TransientError('later'))).toBe(500);
    expect(httpStatusFor(new Error('plain'))).toBe(500);
  });

  test('reports codes and messages for unknown values', () => {
    expect(errorCodeFor(new TaskdeckError('x', 'CUSTOM'))).toBe('CUSTOM');
    expect(errorCodeFor('boom')).toBe('INTERNAL_ERROR');
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });

  test('subclasses stay instances of the base error', () => {
    const error = new ForbiddenError('Cannot delete system tool: Data_Save_File');
    expect(error).toBeInstanceOf(TaskdeckError);
    expect(error.code).toBe('FORBIDDEN');
    expect(error.name).toBe('ForbiddenError');
  });
});
