/**
 * Request Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { formatDuration, formatRequestLine } from '../../src/api/middleware/logger';

const plain = { prefix: '[API]', colorize: false };

describe('formatRequestLine', () => {
  it('tags requests that reach the text generator', () => {
    expect(
      formatRequestLine(plain, { method: 'POST', path: '/api/sessions/start', status: 201, durationMs: 1840 })
    ).toBe('[API] POST /api/sessions/start 201 1.84s gen');

    expect(
      formatRequestLine(plain, {
        method: 'POST',
        path: '/api/sessions/sess_1/message',
        status: 200,
        durationMs: 2310,
      })
    ).toBe('[API] POST /api/sessions/sess_1/message 200 2.31s gen');
  });

  it('leaves other requests untagged', () => {
    expect(
      formatRequestLine(plain, { method: 'GET', path: '/api/sessions/sess_1', status: 404, durationMs: 3 })
    ).toBe('[API] GET  /api/sessions/sess_1 404 3ms');

    expect(
      formatRequestLine(plain, {
        method: 'POST',
        path: '/api/sessions/sess_1/abandon',
        status: 200,
        durationMs: 4,
      })
    ).toBe('[API] POST /api/sessions/sess_1/abandon 200 4ms');
  });

  it('colours the status code', () => {
    expect(
      formatRequestLine(
        { prefix: '[API]', colorize: true },
        { method: 'GET', path: '/api', status: 503, durationMs: 1 }
      )
    ).toBe('[API] GET  /api \x1b[31m503\x1b[0m 1ms');
  });
});

describe('formatDuration', () => {
  it('switches to seconds at one second', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1000)).toBe('1.00s');
  });
});
