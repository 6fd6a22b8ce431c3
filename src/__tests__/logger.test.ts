import { describe, it, expect, vi, beforeEach } from 'vitest';

// Capture the options passed to pino; logger.js calls it at import time
const { captured, errSerializer, isoTime } = vi.hoisted(() => {
  const captured: { options?: Record<string, unknown>; destination?: unknown } = {};
  return {
    captured,
    errSerializer: vi.fn(),
    isoTime: vi.fn(() => ',"time":"2024-01-01T00:00:00.000Z"'),
  };
});

vi.mock('pino', () => {
  const mockPino = Object.assign(
    vi.fn((opts: Record<string, unknown>, destination?: unknown) => {
      captured.options = opts;
      captured.destination = destination;
      return { level: opts?.level ?? 'info' };
    }),
    {
      destination: vi.fn((fd: number) => `fd:${fd}`),
      stdSerializers: { err: errSerializer },
      stdTimeFunctions: { isoTime },
    }
  );
  return { default: mockPino };
});

import { createLogger, resolveLogLevel, wantsPrettyOutput } from '../logger.js';

describe('resolveLogLevel', () => {
  it('defaults to info when unset', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
  });

  it('is case-insensitive', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
  });

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel('banana')).toBe('info');
  });

  it.each(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])('accepts %s', (level) => {
    expect(resolveLogLevel(level)).toBe(level);
  });
});

describe('wantsPrettyOutput', () => {
  it('stays on JSON outside development', () => {
    expect(wantsPrettyOutput({})).toBe(false);
    expect(wantsPrettyOutput({ NODE_ENV: 'production' })).toBe(false);
  });

  it('lets LOG_FORMAT=json override development', () => {
    expect(wantsPrettyOutput({ NODE_ENV: 'development', LOG_FORMAT: 'json' })).toBe(false);
  });
});

describe('createLogger', () => {
  beforeEach(() => {
    captured.options = undefined;
    captured.destination = undefined;
  });

  it('writes JSON to stderr', () => {
    createLogger({ LOG_FORMAT: 'json' });
    expect(captured.destination).toBe('fd:2');
    expect(captured.options?.transport).toBeUndefined();
  });

  it('takes the level from LOG_LEVEL', () => {
    createLogger({ LOG_LEVEL: 'warn' });
    expect(captured.options?.level).toBe('warn');
  });

  it('tags every line with the service name', () => {
    createLogger({});
    expect(captured.options?.base).toEqual({ service: 'blog-scraper' });
  });

  it('formats the level as its label', () => {
    createLogger({});
    const formatters = captured.options?.formatters as
      | { level: (label: string) => Record<string, string> }
      | undefined;
    expect(formatters?.level('info')).toEqual({ level: 'info' });
  });

  it('uses ISO timestamps and the standard error serializer', () => {
    createLogger({});
    expect(captured.options?.timestamp).toBe(isoTime);
    expect(captured.options?.serializers).toEqual({ err: errSerializer });
  });

  it('exports a shared logger instance', async () => {
    const mod = await import('../logger.js');
    expect(mod.logger).toBeDefined();
  });
});
