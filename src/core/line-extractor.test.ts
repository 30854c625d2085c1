/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ExtractorError } from './errors.js';
import { extractLine } from './line-extractor.js';
import { buildExtractorConfig } from './rules.js';

describe('buildExtractorConfig', () => {
  it('always carries log_entry and orders columns independently of flag order', () => {
    expect(buildExtractorConfig({}).columns).toEqual(['log_entry']);
    expect(buildExtractorConfig({ userAgents: true, pattern: 'x' }).columns).toEqual([
      'log_entry',
      'pattern_match',
      'user_agent',
    ]);
    expect(
      buildExtractorConfig({ errorCodes: true, ipAddress: true, userAgents: true, pattern: 'y' })
        .columns,
    ).toEqual(['log_entry', 'pattern_match', 'ip_address', 'error_code', 'user_agent']);
  });

  it('treats an empty pattern as no pattern', () => {
    expect(buildExtractorConfig({ pattern: '' }).rules).toHaveLength(0);
  });

  it('rejects a malformed pattern as a configuration error', () => {
    let thrown: unknown;
    try {
      buildExtractorConfig({ pattern: '(' });
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(ExtractorError);
    expect(thrown).toMatchObject({ kind: 'configuration' });
    expect(thrown instanceof Error ? thrown.message : '').toMatch(/^Invalid regex pattern: /);
  });
});

describe('extractLine', () => {
  it('returns only the trimmed line when no rule is active', () => {
    const record = extractLine('  hello world \t', buildExtractorConfig({}));
    expect(record).toEqual({ log_entry: 'hello world' });
    expect(Object.keys(record)).toEqual(['log_entry']);
  });

  describe('ipv4', () => {
    const config = buildExtractorConfig({ ipAddress: true });

    it('extracts a dotted quad', () => {
      expect(extractLine('Connection from 192.168.1.1 port 22', config).ip_address).toBe(
        '192.168.1.1',
      );
    });

    it('yields null when an octet is out of range', () => {
      expect(extractLine('host 999.999.999.999 down', config).ip_address).toBeNull();
    });

    it('skips an invalid address and returns the first valid one', () => {
      expect(extractLine('256.1.1.1 and 10.0.0.5', config).ip_address).toBe('10.0.0.5');
    });

    it('treats letters and digits outside ASCII as part of a word', () => {
      expect(extractLine('hôte é1.2.3.4', config).ip_address).toBeNull();
      expect(extractLine('hôte 1.2.3.4', config).ip_address).toBe('1.2.3.4');
    });

    it('tolerates leading zeros in an octet', () => {
      expect(extractLine('peer=010.001.1.1', config).ip_address).toBe('010.001.1.1');
    });
  });

  describe('error codes', () => {
    const config = buildExtractorConfig({ errorCodes: true });

    it('stores only the digits', () => {
      expect(extractLine('ERROR 4042: disk full', config).error_code).toBe('4042');
    });

    it('keeps the first occurrence', () => {
      expect(extractLine('ERROR  500 then ERROR 501', config).error_code).toBe('500');
    });

    it('accepts decimal digits from any script', () => {
      expect(extractLine('ERROR \u0664\u0660\u0664 not found', config).error_code).toBe(
        '\u0664\u0660\u0664',
      );
    });

    it('needs whitespace between the token and the digits', () => {
      expect(extractLine('ERROR: timeout', config).error_code).toBeNull();
      expect(extractLine('ERROR500', config).error_code).toBeNull();
    });
  });

  describe('user agents', () => {
    const config = buildExtractorConfig({ userAgents: true });

    it('stores the rest of the line after the header', () => {
      expect(extractLine('User-Agent: Mozilla/5.0', config).user_agent).toBe('Mozilla/5.0');
    });

    it('keeps trailing characters verbatim while log_entry is trimmed', () => {
      const record = extractLine('GET / User-Agent:curl/8.0 extra  ', config);
      expect(record).toEqual({
        log_entry: 'GET / User-Agent:curl/8.0 extra',
        user_agent: 'curl/8.0 extra  ',
      });
    });

    it('yields null without the header', () => {
      expect(extractLine('GET /index.html 200', config).user_agent).toBeNull();
    });
  });

  it('stores the whole match of a custom pattern', () => {
    const config = buildExtractorConfig({ pattern: 'timeout=\\d+ms' });
    expect(extractLine('req 7 timeout=350ms retry', config).pattern_match).toBe('timeout=350ms');
    expect(extractLine('req 8 ok', config).pattern_match).toBeNull();
  });

  it('applies every active rule independently', () => {
    const config = buildExtractorConfig({
      pattern: 'GET \\S+',
      ipAddress: true,
      errorCodes: true,
      userAgents: true,
    });
    expect(
      extractLine('10.1.2.3 GET /api ERROR 503 User-Agent: probe/1.2', config),
    ).toEqual({
      log_entry: '10.1.2.3 GET /api ERROR 503 User-Agent: probe/1.2',
      pattern_match: 'GET /api',
      ip_address: '10.1.2.3',
      error_code: '503',
      user_agent: 'probe/1.2',
    });
    expect(extractLine('nothing here', config)).toEqual({
      log_entry: 'nothing here',
      pattern_match: null,
      ip_address: null,
      error_code: null,
      user_agent: null,
    });
  });
});
