import assert from 'node:assert';
import { describe, it } from 'node:test';
import { Converter } from '../converter';
import { p, strong, t } from './helpers';

const mentionDoc = {
  version: 1,
  type: 'doc',
  content: [p(t('Owner: '), { type: 'mention', attrs: { id: 'acct-9', text: '@Sam' } })],
};

describe('Converter', () => {
  it('renders mentions with the configured base URL', () => {
    const converter = new Converter({ baseUrl: 'https://example.test' });
    assert.strictEqual(
      converter.toMarkdown(mentionDoc),
      'Owner: [@Sam](https://example.test/jira/people/acct-9)'
    );
  });

  it('renders mentions as text without a base URL', () => {
    assert.strictEqual(new Converter().toMarkdown(mentionDoc), 'Owner: @Sam');
  });

  it('parses Markdown with warnings', () => {
    const { document, warnings } = new Converter().toADF('Plain **text**');
    assert.deepStrictEqual(document.content, [p(t('Plain '), t('text', strong))]);
    assert.deepStrictEqual(warnings, []);
  });

  it('validates the document envelope', () => {
    const converter = new Converter();
    assert.deepStrictEqual(converter.validate({ version: 1, type: 'doc', content: [] }), {
      valid: true,
      errors: [],
    });
    assert.deepStrictEqual(converter.validate({ version: 2, type: 'doc', content: [] }), {
      valid: false,
      errors: ['/version must be equal to constant'],
    });
  });

  it('round-trips a document through Markdown', () => {
    const converter = new Converter({ baseUrl: 'https://example.test' });
    const { document, warnings } = converter.roundTrip({
      version: 1,
      type: 'doc',
      content: [
        { type: 'heading', attrs: { level: 2 }, content: [t('Scope')] },
        p(t('Owner: '), { type: 'mention', attrs: { id: 'acct-9', text: '@Sam' } }),
      ],
    });
    assert.deepStrictEqual(warnings, []);
    assert.deepStrictEqual(document.content, [
      { type: 'heading', attrs: { level: 2 }, content: [t('Scope')] },
      p(t('Owner: '), { type: 'mention', attrs: { id: 'acct-9', text: '@Sam' } }),
    ]);
  });
});
