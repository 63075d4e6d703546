import { Request, Response } from 'express';
import { SecurityHeadersMiddleware } from '../../src/middleware/security-headers.middleware';

describe('SecurityHeadersMiddleware', () => {
  it('should set every security header and continue', () => {
    const res = { setHeader: jest.fn() };
    const next = jest.fn();

    new SecurityHeadersMiddleware().use({} as Request, res as unknown as Response, next);

    expect(res.setHeader.mock.calls).toEqual([
      ['X-Content-Type-Options', 'nosniff'],
      ['X-Frame-Options', 'DENY'],
      ['X-XSS-Protection', '1; mode=block'],
      ['Referrer-Policy', 'strict-origin-when-cross-origin'],
      [
        'Content-Security-Policy',
        "default-src 'self'; script-src 'self'; style-src 'self'; img-src 'self' data:; frame-ancestors 'none'",
      ],
    ]);
    expect(next).toHaveBeenCalledTimes(1);
  });
});
