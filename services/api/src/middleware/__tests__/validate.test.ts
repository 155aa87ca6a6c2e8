/// <reference types="jest" />

import type { NextFunction, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import { validate } from '../validate';

const schema = z.object({
  params: z.object({ sessionId: z.string().uuid() }),
  body: z.object({ text: z.string().trim().min(1) }),
});

function makeRequest(body: unknown, params: Record<string, string>): Request {
  const req = { body, params, query: {} };
  return req as unknown as Request;
}

describe('validate', () => {
  const res = {} as Response;

  it('should replace body and params with parsed values', () => {
    const req = makeRequest(
      { text: '  30 min yoga  ', extra: true },
      { sessionId: '5b6f1c9e-3b1a-4c55-9d1e-2f8b7a6c4d3e' }
    );
    const next: NextFunction = jest.fn();

    validate(schema)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ text: '30 min yoga' });
    expect(req.params).toEqual({
      sessionId: '5b6f1c9e-3b1a-4c55-9d1e-2f8b7a6c4d3e',
    });
  });

  it('should forward a ZodError on invalid input', () => {
    const req = makeRequest({ text: '   ' }, { sessionId: 'not-a-uuid' });
    const next = jest.fn();

    validate(schema)(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    const [error] = next.mock.calls[0];
    expect(error).toBeInstanceOf(ZodError);
    if (error instanceof ZodError) {
      expect(error.issues.map((issue) => issue.path.join('.'))).toEqual([
        'params.sessionId',
        'body.text',
      ]);
    }
  });
});
