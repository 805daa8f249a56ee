import assert from 'node:assert';
import { describe, it } from 'node:test';
import { parse } from '../parser';
import { render } from '../renderer';

const release = [
  '# Release notes',
  'Intro with **bold**, *italic*, ~~gone~~ and `code`.',
  '- one\n- two\n  - nested',
  '1. first\n2. second',
  '- [ ] todo\n- [x] done',
  '| Name | Value |\n|-|-|\n| alpha | 1 |',
  '> [!TIP]\n> Keep it short',
  '> `[decision:d]` Approved the plan',
  '```ts\nconst a = 1;\n```',
  '---',
  'Final line',
].join('\n\n');

describe('Round trips', () => {
  it('renders parsed Markdown back to the same text', () => {
    const { document, warnings } = parse(release, true);
    assert.deepStrictEqual(warnings, []);
    assert.strictEqual(render(document), release);
  });

  it('keeps the document stable through Markdown', () => {
    const first = parse(release);
    const second = parse(render(first));
    assert.deepStrictEqual(second, first);
  });

  it('keeps mentions when a base URL is given', () => {
    const markdown = 'Ping [@Jane](https://example.test/jira/people/acct-1) today';
    assert.strictEqual(render(parse(markdown), 'https://example.test'), markdown);
  });

  it('keeps dates', () => {
    const markdown = 'Due `[date]2024-01-15`';
    assert.strictEqual(render(parse(markdown)), markdown);
  });

  it('keeps hard breaks', () => {
    const markdown = 'line one\\\nline two';
    assert.strictEqual(render(parse(markdown)), markdown);
  });
});
