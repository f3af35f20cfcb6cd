import { describe, it, expect, afterEach } from 'vitest';
import { isLogLevel, logger, resetLogSink, setLogLevel, setLogSink } from '../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];

  function capture(isTTY = false): void {
    lines = [];
    setLogSink({ write: (chunk: string) => lines.push(chunk), isTTY });
  }

  afterEach(() => {
    resetLogSink();
    setLogLevel('warn');
  });

  it('drops messages below the current level', () => {
    capture();

    logger.debug('exec: git status --porcelain');
    logger.info('Created PR: https://github.com/OWNER/REPO/pull/1');
    logger.warn('Only looking up the first 5 of 7 remotes');

    expect(lines).toEqual(['pullcraft warn: Only looking up the first 5 of 7 remotes\n']);
  });

  it('writes debug lines once verbose', () => {
    capture();
    setLogLevel('debug');

    logger.debug('exec: git remote -v');

    expect(lines).toEqual(['pullcraft debug: exec: git remote -v\n']);
  });

  it('stays quiet when silent', () => {
    capture();
    setLogLevel('silent');

    logger.error('boom');

    expect(lines).toEqual([]);
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});
