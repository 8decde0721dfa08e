import { Writable } from 'node:stream';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, formatLogEvent } from '../logging.js';
import type { BundleLogEvent } from '../types.js';

const STARTED: BundleLogEvent = {
  name: 'bundle.started',
  timestamp: '2024-06-11T00:00:00.000Z',
  srcDir: '/repo/frontend',
  distDir: '/repo/out/ui',
  wasmVersion: '0.1.0',
  release: false,
};

function createCollectingStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, chunks };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatLogEvent', () => {
  it('writes one compact JSON line per event', () => {
    expect(formatLogEvent(STARTED)).toBe(
      '{"name":"bundle.started","timestamp":"2024-06-11T00:00:00.000Z","srcDir":"/repo/frontend","distDir":"/repo/out/ui","wasmVersion":"0.1.0","release":false}\n',
    );
  });

  it('indents when pretty output is requested', () => {
    const formatted = formatLogEvent(STARTED, true);

    expect(formatted.startsWith('{\n  "name": "bundle.started",\n')).toBe(true);
    expect(formatted.endsWith('}\n')).toBe(true);
    expect(JSON.parse(formatted)).toEqual(STARTED);
  });
});

describe('createLogger', () => {
  it('writes events to the provided stream', () => {
    const { stream, chunks } = createCollectingStream();
    const logger = createLogger({ stream });

    logger(STARTED);

    expect(chunks).toEqual([formatLogEvent(STARTED)]);
  });

  it('defaults to stderr', () => {
    const stderrWrite = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createLogger()(STARTED);

    expect(stderrWrite).toHaveBeenCalledWith(formatLogEvent(STARTED));
  });
});
