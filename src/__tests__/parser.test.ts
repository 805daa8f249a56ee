import assert from 'node:assert';
import { describe, it } from 'node:test';
import { parse } from '../parser';
import { code, em, link, p, strike, strong, t } from './helpers';

describe('Markdown parsing', () => {
  it('returns a single empty paragraph for empty input', () => {
    const empty = { version: 1, type: 'doc', content: [{ type: 'paragraph', content: [] }] };
    assert.deepStrictEqual(parse(''), empty);
    assert.deepStrictEqual(parse('  \n\n'), empty);
    assert.deepStrictEqual(parse('', true), { document: empty, warnings: [] });
  });

  it('parses headings and paragraphs', () => {
    assert.deepStrictEqual(parse('# Title\n\nHello **world**').content, [
      { type: 'heading', attrs: { level: 1 }, content: [t('Title')] },
      p(t('Hello '), t('world', strong)),
    ]);
  });

  it('parses inline marks and links', () => {
    assert.deepStrictEqual(parse('*a* ~~b~~ `c` [d](https://example.test)').content, [
      p(
        t('a', em),
        t(' '),
        t('b', strike),
        t(' '),
        t('c', code),
        t(' '),
        t('d', link('https://example.test'))
      ),
    ]);
  });

  it('stacks marks from nested emphasis', () => {
    assert.deepStrictEqual(parse('***x***').content, [p(t('x', em, strong))]);
  });

  it('turns soft line breaks into spaces and backslash breaks into hard breaks', () => {
    assert.deepStrictEqual(parse('a\nb').content, [p(t('a b'))]);
    assert.deepStrictEqual(parse('a\\\nb').content, [p(t('a'), { type: 'hardBreak' }, t('b'))]);
  });

  it('parses nested bullet lists', () => {
    assert.deepStrictEqual(parse('- a\n- b\n  - c').content, [
      {
        type: 'bulletList',
        content: [
          { type: 'listItem', content: [p(t('a'))] },
          {
            type: 'listItem',
            content: [
              p(t('b')),
              { type: 'bulletList', content: [{ type: 'listItem', content: [p(t('c'))] }] },
            ],
          },
        ],
      },
    ]);
  });

  it('parses ordered lists without a start attribute', () => {
    assert.deepStrictEqual(parse('1. one\n2. two').content, [
      {
        type: 'orderedList',
        content: [
          { type: 'listItem', content: [p(t('one'))] },
          { type: 'listItem', content: [p(t('two'))] },
        ],
      },
    ]);
  });

  it('parses task lists', () => {
    assert.deepStrictEqual(parse('- [ ] todo\n- [x] done').content, [
      {
        type: 'taskList',
        attrs: { localId: '' },
        content: [
          { type: 'taskItem', attrs: { localId: '', state: 'TODO' }, content: [t('todo')] },
          { type: 'taskItem', attrs: { localId: '', state: 'DONE' }, content: [t('done')] },
        ],
      },
    ]);
  });

  it('keeps checkboxes as text in a list that mixes tasks and plain items', () => {
    const { document, warnings } = parse('- [ ] todo\n- plain', true);
    assert.deepStrictEqual(document.content, [
      {
        type: 'bulletList',
        content: [
          { type: 'listItem', content: [p(t('[ ] todo'))] },
          { type: 'listItem', content: [p(t('plain'))] },
        ],
      },
    ]);
    assert.deepStrictEqual(warnings, [
      'Line 1: List mixes task items with plain items; checkboxes were kept as text',
    ]);
  });

  it('parses fenced code blocks', () => {
    assert.deepStrictEqual(parse('```ts\nconst a = 1;\n```').content, [
      { type: 'codeBlock', attrs: { language: 'ts' }, content: [t('const a = 1;')] },
    ]);
    assert.deepStrictEqual(parse('```\nplain\n```').content, [
      { type: 'codeBlock', content: [t('plain')] },
    ]);
  });

  it('parses block quotes and rules', () => {
    assert.deepStrictEqual(parse('> quoted\n\n---\n\nafter').content, [
      { type: 'blockquote', content: [p(t('quoted'))] },
      { type: 'rule' },
      p(t('after')),
    ]);
  });

  it('parses profile links as mentions', () => {
    assert.deepStrictEqual(parse('Ask [@Jane](https://example.test/jira/people/acct-1)').content, [
      p(t('Ask '), { type: 'mention', attrs: { id: 'acct-1', text: '@Jane' } }),
    ]);
  });

  it('parses date chips back to date nodes', () => {
    assert.deepStrictEqual(parse('Due `[date]2024-01-15`', true), {
      document: {
        version: 1,
        type: 'doc',
        content: [p(t('Due '), { type: 'date', attrs: { timestamp: String(Date.UTC(2024, 0, 15)) } })],
      },
      warnings: [],
    });
  });
});

describe('Table parsing', () => {
  it('maps the header row to table headers and the rest to cells', () => {
    assert.deepStrictEqual(parse('| A | B |\n|---|---|\n| 1 | x\\|y |').content, [
      {
        type: 'table',
        content: [
          {
            type: 'tableRow',
            content: [
              { type: 'tableHeader', content: [p(t('A'))] },
              { type: 'tableHeader', content: [p(t('B'))] },
            ],
          },
          {
            type: 'tableRow',
            content: [
              { type: 'tableCell', content: [p(t('1'))] },
              { type: 'tableCell', content: [p(t('x|y'))] },
            ],
          },
        ],
      },
    ]);
  });

  it('parses a header-only table', () => {
    assert.deepStrictEqual(parse('| A |\n|-|').content, [
      {
        type: 'table',
        content: [{ type: 'tableRow', content: [{ type: 'tableHeader', content: [p(t('A'))] }] }],
      },
    ]);
  });

  it('ends the table at a blank line', () => {
    const content = parse('| A |\n|-|\n\nFollow-up details go here').content;
    assert.strictEqual(content.length, 2);
    assert.strictEqual(content[0].type, 'table');
    assert.deepStrictEqual(content[1], p(t('Follow-up details go here')));
  });

  it('gives empty cells an empty paragraph', () => {
    const [table] = parse('| A | B |\n|-|-|\n| 1 |  |').content;
    assert.ok(table.type === 'table');
    assert.deepStrictEqual(table.content[1].content[1], {
      type: 'tableCell',
      content: [{ type: 'paragraph', content: [] }],
    });
  });
});

describe('Parse warnings', () => {
  it('reports an unclosed bold marker with its line', () => {
    assert.deepStrictEqual(parse('First line\n\nSecond **oops', true).warnings, [
      'Line 3: Unclosed bold marker (**) in "Second **oops"',
    ]);
  });

  it('reports an unclosed code marker', () => {
    assert.deepStrictEqual(parse('Run `make check', true).warnings, [
      'Line 1: Unclosed inline code marker (`) in "Run `make check"',
    ]);
  });

  it('reports link text without a URL', () => {
    assert.deepStrictEqual(parse('See [the docs] for more', true).warnings, [
      'Line 1: Incomplete link syntax, missing URL in "See [the docs] for more"',
    ]);
  });

  it('reports a rule run into text', () => {
    assert.deepStrictEqual(parse('---text', true).warnings, [
      'Line 1: Possible malformed horizontal rule; a rule needs a line of its own',
    ]);
  });

  it('keeps status chips as code and warns', () => {
    const { document, warnings } = parse('`[status:g]DONE`', true);
    assert.deepStrictEqual(document.content, [p(t('[status:g]DONE', code))]);
    assert.deepStrictEqual(warnings, [
      'Line 1: Status "[status:g]DONE" cannot be created from Markdown; it was kept as inline code',
    ]);
  });

  it('keeps invalid date chips as code and warns', () => {
    const { document, warnings } = parse('`[date]2024-13-01`', true);
    assert.deepStrictEqual(document.content, [p(t('[date]2024-13-01', code))]);
    assert.deepStrictEqual(warnings, [
      'Line 1: Date "2024-13-01" is not a valid YYYY-MM-DD date; it was kept as inline code',
    ]);
  });

  it('keeps image alt text as a link and warns once', () => {
    const { document, warnings } = parse(
      '![one](https://example.test/1.png) ![two](https://example.test/2.png)',
      true
    );
    assert.deepStrictEqual(document.content, [
      p(t('one', link('https://example.test/1.png')), t(' '), t('two', link('https://example.test/2.png'))),
    ]);
    assert.deepStrictEqual(warnings, ['Line 1: Images cannot be embedded; they were kept as links']);
  });

  it('keeps raw HTML as text and warns', () => {
    const { document, warnings } = parse('<div>hi</div>', true);
    assert.deepStrictEqual(document.content, [p(t('<div>hi</div>'))]);
    assert.deepStrictEqual(warnings, ['Line 1: Raw HTML is not supported; it was kept as plain text']);
  });

  it('flattens nested block quotes into the outer quote', () => {
    const { document, warnings } = parse('> outer\n>\n> > inner', true);
    assert.deepStrictEqual(document.content, [
      { type: 'blockquote', content: [p(t('outer')), p(t('inner'))] },
    ]);
    assert.strictEqual(warnings.length, 1);
    assert.match(warnings[0], /^Line \d+: Nested block quotes are not supported/);
  });

  it('reports a nested quote before the problems inside it', () => {
    assert.deepStrictEqual(parse('> > **oops', true), {
      document: { version: 1, type: 'doc', content: [{ type: 'blockquote', content: [p(t('**oops'))] }] },
      warnings: [
        'Line 1: Nested block quotes are not supported; the inner quote was merged into the outer one',
        'Line 1: Unclosed bold marker (**) in "**oops"',
      ],
    });
  });

  it('returns no warnings for clean Markdown', () => {
    assert.deepStrictEqual(parse('# Plan\n\n- one\n- two\n\nDone.', true).warnings, []);
  });
});

describe('Parser robustness', () => {
  it('never throws on unusual input', () => {
    const inputs = [
      '> ',
      '|',
      '| |\n|-|',
      '```',
      '- [ ]',
      '> [!NOTE]',
      '> `[decision:d]`',
      '**',
      '[](',
      '\u0000\u0001',
      '#'.repeat(10),
      '>'.repeat(50) + ' deep',
      '-\n'.repeat(20),
    ];
    for (const input of inputs) {
      const { document } = parse(input, true);
      assert.strictEqual(document.type, 'doc');
      assert.ok(document.content.length > 0);
    }
  });
});
