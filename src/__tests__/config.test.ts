import assert from 'node:assert';
import { describe, it, mock } from 'node:test';
import { getConverterConfig, normalizeBaseUrl } from '../config';

describe('Converter config', () => {
  it('reads the base URL and strips trailing slashes', () => {
    assert.deepStrictEqual(getConverterConfig({ ADFMD_BASE_URL: 'https://example.test/' }), {
      baseUrl: 'https://example.test',
      trackWarnings: true,
    });
  });

  it('falls back to JIRA_BASE_URL', () => {
    assert.strictEqual(
      getConverterConfig({ JIRA_BASE_URL: 'https://fallback.example.test' }).baseUrl,
      'https://fallback.example.test'
    );
  });

  it('defaults to no base URL', () => {
    assert.deepStrictEqual(getConverterConfig({}), { baseUrl: null, trackWarnings: true });
  });

  it('reads the warning flag', () => {
    assert.strictEqual(getConverterConfig({ ADFMD_TRACK_WARNINGS: '0' }).trackWarnings, false);
    assert.strictEqual(getConverterConfig({ ADFMD_TRACK_WARNINGS: 'TRUE' }).trackWarnings, true);
  });

  it('rejects base URLs that are not http(s)', () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      assert.strictEqual(normalizeBaseUrl('ftp://example.test'), null);
      assert.strictEqual(normalizeBaseUrl('not a url'), null);
      assert.strictEqual(warn.mock.callCount(), 2);
    } finally {
      warn.mock.restore();
    }
  });
});
