/**
 * CLI Output Tests
 */

import { describe, it, expect } from 'vitest';
import { formatSources, loggerConfig } from '../../src/cli/index.js';
import { parseConfig } from '../../src/utils/config.js';

describe('formatSources', () => {
  it('should number sources and show links', () => {
    expect(
      formatSources([
        { text: 'Intro to Testing - Lesson 1', link: 'https://example.com/testing/1' },
        { text: 'Intro to Testing - Lesson 2' },
      ])
    ).toBe('1. Intro to Testing - Lesson 1 <https://example.com/testing/1>\n2. Intro to Testing - Lesson 2');
  });

  it('should return an empty string for no sources', () => {
    expect(formatSources([])).toBe('');
  });
});

describe('loggerConfig', () => {
  it('should use the configured log level', () => {
    const config = parseConfig({ log: { level: 'error', pretty: false, file: '/tmp/lectern.log' } });

    expect(loggerConfig(config)).toEqual({ level: 'error', pretty: false, destination: '/tmp/lectern.log' });
  });

  it('should default to warn', () => {
    expect(loggerConfig(parseConfig({})).level).toBe('warn');
  });

  it('should switch to debug when verbose', () => {
    const config = parseConfig({ log: { level: 'error' } });

    expect(loggerConfig(config, true).level).toBe('debug');
  });
});
