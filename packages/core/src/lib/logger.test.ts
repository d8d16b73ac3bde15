import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { describe, expect, it } from 'vitest';
import { buildTransports, createLogger } from './logger';

function captureTransport(lines: string[]): winston.transport {
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().trim());
      callback();
    },
  });
  return new winston.transports.Stream({ stream, format: winston.format.json() });
}

describe('logger transports', () => {
  it('defaults to console-only output', () => {
    const transports = buildTransports({});
    expect(transports).toHaveLength(1);
    expect(transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('adds combined and error file transports when file logging is enabled', () => {
    const transports = buildTransports({
      fileLogging: true,
      dirPath: path.join(os.tmpdir(), 'helpdesk-logger-test'),
    });

    const fileTransports = transports.filter((t) => t instanceof DailyRotateFile);
    expect(fileTransports).toHaveLength(2);
    expect(fileTransports.map((t) => t.level)).toEqual([undefined, 'error']);

    for (const transport of fileTransports) {
      transport.close?.();
    }
  });
});

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('createLogger', () => {
  it('writes custom levels with structured meta', async () => {
    const lines: string[] = [];
    const log = createLogger({ level: 'trace', transports: [captureTransport(lines)] });

    log.trace('[QueueAccess] resolved scope', { userId: 5 });
    await flush();

    const entry: unknown = JSON.parse(lines[lines.length - 1] ?? '{}');
    expect(entry).toMatchObject({ level: 'trace', message: '[QueueAccess] resolved scope', userId: 5 });
  });

  it('drops messages below the configured level', async () => {
    const lines: string[] = [];
    const log = createLogger({ level: 'warn', transports: [captureTransport(lines)] });

    log.debug('[TicketHistory] skipped', { suppressed: true });
    log.warn('[TicketHistory] audit write failed', { auditWriteFailed: true });
    await flush();

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'warn', auditWriteFailed: true });
  });
});
