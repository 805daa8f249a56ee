import { lexer, type Token, type Tokens } from 'marked';
import { applyAlertPanels } from './extensions/alerts';
import { applyDecisionMarkers } from './extensions/decisions';
import {
  type AlertToken,
  type DecisionToken,
  known,
  mergeAdjacentText,
  newlines,
  textToken,
} from './extensions/tokens';
import {
  ALERT_LIKE_MARKER,
  DECISION_LIKE_MARKER,
  STATUS_MARKER,
  decodeMention,
  matchDateMarker,
  matchDecisionMarker,
  panelTypeForAlert,
} from './markers';
import type {
  AdfBlock,
  AdfDocument,
  AdfInline,
  AdfListItem,
  AdfMark,
  AdfParagraph,
  AdfTable,
  AdfTableCell,
  AdfTaskItem,
  AdfTaskList,
  ParseResult,
} from './types';
import { WarningCollector } from './warnings';

interface BlockContext {
  // 1-based source line of the token being mapped
  line: number;
  // Number of block quotes (plain, alert or decision) around the token
  quoteDepth: number;
  inListItem: boolean;
}

const TASK_MARKER = /^-?\s*\[([ xX])\](\s|$)/;
const MALFORMED_RULE = /^(-{3,}|_{3,}|\*{3,})[^\s\-_*]/;

function emptyParagraph(): AdfParagraph {
  return { type: 'paragraph', content: [] };
}

function emptyDocument(): AdfDocument {
  return { version: 1, type: 'doc', content: [emptyParagraph()] };
}

/**
 * Last-resort document for input the lexer could not handle: one plain
 * paragraph per blank-line separated chunk.
 */
function fallbackDocument(markdown: string): AdfDocument {
  const content: AdfBlock[] = markdown
    .split(/\n\s*\n/)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk !== '')
    .map((chunk): AdfParagraph => ({ type: 'paragraph', content: [{ type: 'text', text: chunk }] }));
  return { version: 1, type: 'doc', content: content.length > 0 ? content : [emptyParagraph()] };
}

function withMark(marks: AdfMark[], mark: AdfMark): AdfMark[] {
  return marks.some((existing) => existing.type === mark.type) ? marks : [...marks, mark];
}

function textNode(text: string, marks: AdfMark[]): AdfInline[] {
  if (text === '') return [];
  return marks.length > 0 ? [{ type: 'text', text, marks: [...marks] }] : [{ type: 'text', text }];
}

function sameMarks(a: AdfMark[] = [], b: AdfMark[] = []): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function mergeInline(nodes: AdfInline[]): AdfInline[] {
  const merged: AdfInline[] = [];
  for (const node of nodes) {
    const previous = merged[merged.length - 1];
    if (
      previous &&
      previous.type === 'text' &&
      node.type === 'text' &&
      sameMarks(previous.marks, node.marks)
    ) {
      merged[merged.length - 1] = { ...previous, text: previous.text + node.text };
    } else {
      merged.push(node);
    }
  }
  return merged;
}

function plainTokenText(tokens: Token[]): string {
  return tokens
    .map((token) => {
      const current = known(token);
      if ('tokens' in current && Array.isArray(current.tokens) && current.tokens.length > 0) {
        return plainTokenText(current.tokens);
      }
      return 'text' in current && typeof current.text === 'string' ? current.text : '';
    })
    .join('');
}

/**
 * Maps the (already tagged) marked token tree onto ADF nodes, one instance
 * per parse.
 */
class TokenMapper {
  constructor(private readonly warnings: WarningCollector) {}

  blocks(tokens: Token[], context: BlockContext): AdfBlock[] {
    const content: AdfBlock[] = [];
    let line = context.line;
    for (const token of tokens) {
      content.push(...this.block(token, { ...context, line }));
      line += newlines(token.raw);
    }
    return content;
  }

  private block(token: Token, context: BlockContext): AdfBlock[] {
    const current = known(token);
    switch (current.type) {
      case 'paragraph':
        this.checkRule(current.text, context.line);
        return this.paragraph(current.tokens, context.line);
      case 'text':
        return this.paragraph(current.tokens ?? [textToken(current.text)], context.line);
      case 'heading': {
        const level = Math.min(6, Math.max(1, current.depth));
        return [{ type: 'heading', attrs: { level }, content: this.inline(current.tokens, context.line) }];
      }
      case 'blockquote':
        return this.blockquote(current, context);
      case 'alert':
        return this.alert(current, context);
      case 'decision':
        return this.decision(current, context);
      case 'list':
        return this.list(current, context);
      case 'list_item':
        return this.blocks(current.tokens, context);
      case 'table':
        return [this.table(current, context.line)];
      case 'code': {
        const language = (current.lang ?? '').trim();
        return [
          {
            type: 'codeBlock',
            ...(language ? { attrs: { language } } : {}),
            content: current.text ? [{ type: 'text', text: current.text }] : [],
          },
        ];
      }
      case 'hr':
        return [{ type: 'rule' }];
      case 'space':
      case 'def':
        return [];
      case 'html': {
        this.warnings.addOnce(
          'html',
          'Raw HTML is not supported; it was kept as plain text',
          context.line
        );
        const text = current.text.trim();
        return text ? [{ type: 'paragraph', content: [{ type: 'text', text }] }] : [];
      }
      default:
        // Inline tokens that surfaced at block level
        return this.paragraph([token], context.line);
    }
  }

  private paragraph(tokens: Token[], line: number): AdfParagraph[] {
    const content = this.inline(tokens, line);
    return content.length > 0 ? [{ type: 'paragraph', content }] : [];
  }

  /**
   * Map the children of a quote. A quote inside another quote is merged into
   * it; the warning is raised before the children so it precedes theirs.
   */
  private quoteContent(tokens: Token[], context: BlockContext): AdfBlock[] {
    if (context.quoteDepth > 0) {
      this.warnings.add(
        'Nested block quotes are not supported; the inner quote was merged into the outer one',
        context.line
      );
    }
    return this.blocks(tokens, { ...context, quoteDepth: context.quoteDepth + 1 });
  }

  private blockquote(token: Tokens.Blockquote, context: BlockContext): AdfBlock[] {
    this.checkAlertLike(token.tokens, context.line);
    const content = this.quoteContent(token.tokens, context);
    return context.quoteDepth > 0 ? content : [{ type: 'blockquote', content }];
  }

  private alert(token: AlertToken, context: BlockContext): AdfBlock[] {
    // Panels may only sit at the top level of the document
    const flatten = context.quoteDepth > 0 || context.inListItem;
    if (flatten) {
      const where = context.quoteDepth > 0 ? 'a block quote' : 'a list item';
      this.warnings.add(
        `Alert [!${token.alert}] inside ${where} cannot become a panel; its text was kept`,
        context.line
      );
    }
    const content = this.blocks(token.tokens, { ...context, quoteDepth: context.quoteDepth + 1 });
    return flatten ? content : [{ type: 'panel', attrs: { panelType: panelTypeForAlert(token.alert) }, content }];
  }

  private decision(token: DecisionToken, context: BlockContext): AdfBlock[] {
    const content = this.quoteContent(token.tokens, context);
    return context.quoteDepth > 0 ? content : [{ type: 'blockquote', content }];
  }

  private list(token: Tokens.List, context: BlockContext): AdfBlock[] {
    const taskCount = token.items.filter((item) => item.task).length;
    if (taskCount > 0 && taskCount === token.items.length) {
      return this.taskList(token.items, context);
    }
    if (taskCount > 0) {
      this.warnings.add(
        'List mixes task items with plain items; checkboxes were kept as text',
        context.line
      );
    }

    let line = context.line;
    const items: AdfListItem[] = token.items.map((item) => {
      const mapped = this.listItem(item, { ...context, line });
      line += newlines(item.raw);
      return mapped;
    });
    return [token.ordered ? { type: 'orderedList', content: items } : { type: 'bulletList', content: items }];
  }

  private listItem(item: Tokens.ListItem, context: BlockContext): AdfListItem {
    const content = this.blocks(item.tokens, { ...context, inListItem: true });
    if (item.task) {
      const box: AdfInline = { type: 'text', text: item.checked ? '[x] ' : '[ ] ' };
      const [first, ...rest] = content;
      if (first && first.type === 'paragraph') {
        return { type: 'listItem', content: [{ ...first, content: mergeInline([box, ...first.content]) }, ...rest] };
      }
      return { type: 'listItem', content: [{ type: 'paragraph', content: [box] }, ...content] };
    }
    return { type: 'listItem', content: content.length > 0 ? content : [emptyParagraph()] };
  }

  /**
   * ADF task items hold inline content only. Nested task lists stay nested;
   * any other block under a task item is moved out after the list.
   */
  private taskList(items: Tokens.ListItem[], context: BlockContext): AdfBlock[] {
    const result: AdfBlock[] = [];
    let pending: Array<AdfTaskItem | AdfTaskList> = [];

    const flush = () => {
      if (pending.length === 0) return;
      result.push({ type: 'taskList', attrs: { localId: '' }, content: pending });
      pending = [];
    };

    let itemLine = context.line;
    for (const item of items) {
      const inline: AdfInline[] = [];
      const nested: AdfTaskList[] = [];
      const extracted: AdfBlock[] = [];
      let line = itemLine;

      for (const child of item.tokens) {
        const current = known(child);
        if (current.type === 'text' || current.type === 'paragraph') {
          if (inline.length > 0) inline.push({ type: 'hardBreak' });
          inline.push(...this.inline(current.tokens ?? [textToken(current.text)], line));
        } else if (current.type !== 'space') {
          for (const block of this.block(child, { ...context, line, inListItem: true })) {
            if (block.type === 'taskList') {
              nested.push(block);
            } else {
              extracted.push(block);
            }
          }
        }
        line += newlines(child.raw);
      }

      if (extracted.length > 0) {
        this.warnings.add(
          'Task items can only hold text; nested content was moved below the task list',
          itemLine
        );
      }

      pending.push(
        {
          type: 'taskItem',
          attrs: { localId: '', state: item.checked ? 'DONE' : 'TODO' },
          content: mergeInline(inline),
        },
        ...nested
      );
      if (extracted.length > 0) {
        flush();
        result.push(...extracted);
      }
      itemLine += newlines(item.raw);
    }
    flush();

    return result;
  }

  private table(token: Tokens.Table, line: number): AdfTable {
    const header = {
      type: 'tableRow' as const,
      content: token.header.map((cell) => this.cell('tableHeader', cell.tokens, line)),
    };
    // Body rows start after the header and delimiter lines
    const rows = token.rows.map((row, index) => ({
      type: 'tableRow' as const,
      content: row.map((cell) => this.cell('tableCell', cell.tokens, line + 2 + index)),
    }));
    return { type: 'table', content: [header, ...rows] };
  }

  private cell(type: AdfTableCell['type'], tokens: Token[], line: number): AdfTableCell {
    return { type, content: [{ type: 'paragraph', content: this.inline(tokens, line) }] };
  }

  private inline(tokens: Token[], line: number, marks: AdfMark[] = []): AdfInline[] {
    const nodes: AdfInline[] = [];
    let current = line;
    for (const token of mergeAdjacentText(tokens)) {
      nodes.push(...this.inlineToken(token, current, marks));
      current += newlines(token.raw);
    }
    return mergeInline(nodes);
  }

  private inlineToken(token: Token, line: number, marks: AdfMark[]): AdfInline[] {
    const current = known(token);
    switch (current.type) {
      case 'text':
        if (current.tokens) {
          return this.inline(current.tokens, line, marks);
        }
        this.checkText(current.text, line);
        return textNode(current.text.replace(/\n/g, ' '), marks);
      case 'escape':
        return textNode(current.text, marks);
      case 'strong':
        return this.inline(current.tokens, line, withMark(marks, { type: 'strong' }));
      case 'em':
        return this.inline(current.tokens, line, withMark(marks, { type: 'em' }));
      case 'del':
        return this.inline(current.tokens, line, withMark(marks, { type: 'strike' }));
      case 'codespan':
        return this.codeSpan(current.text, line, marks);
      case 'br':
        return [{ type: 'hardBreak' }];
      case 'link':
        return this.link(current, line, marks);
      case 'image':
        this.warnings.addOnce(
          'image',
          'Images cannot be embedded; they were kept as links',
          line
        );
        return textNode(current.text || current.href, withMark(marks, { type: 'link', attrs: { href: current.href } }));
      case 'html':
        this.warnings.addOnce('html', 'Raw HTML is not supported; it was kept as plain text', line);
        return textNode(current.text, marks);
      default:
        this.warnings.addOnce(
          current.type,
          `Unsupported Markdown element "${current.type}"; it was kept as plain text`,
          line
        );
        return textNode(current.raw, marks);
    }
  }

  private link(token: Tokens.Link, line: number, marks: AdfMark[]): AdfInline[] {
    const accountId = decodeMention(token.href);
    if (accountId) {
      const text = plainTokenText(token.tokens) || token.text;
      return [{ type: 'mention', attrs: { id: accountId, text } }];
    }
    const linked = withMark(marks, { type: 'link', attrs: { href: token.href } });
    const content = this.inline(token.tokens, line, linked);
    return content.length > 0 ? content : textNode(token.href, linked);
  }

  private codeSpan(text: string, line: number, marks: AdfMark[]): AdfInline[] {
    const date = matchDateMarker(text);
    if (date && date.kind === 'date') {
      return [{ type: 'date', attrs: { timestamp: date.timestamp } }];
    }
    if (date) {
      this.warnings.add(
        `Date "${date.value}" is not a valid YYYY-MM-DD date; it was kept as inline code`,
        line
      );
    }

    if (STATUS_MARKER.test(text)) {
      this.warnings.add(
        `Status "${text}" cannot be created from Markdown; it was kept as inline code`,
        line
      );
    }

    const decision = matchDecisionMarker(text);
    if (decision && decision.kind === 'invalid') {
      this.warnings.add(
        `Unknown decision state "${decision.letter}" in ${decision.marker}; expected d, a or u`,
        line
      );
    } else if (decision) {
      this.warnings.add(
        'Decision markers only apply at the start of a paragraph in a block quote; kept as inline code',
        line
      );
    }

    return textNode(text, withMark(marks, { type: 'code' }));
  }

  private checkAlertLike(tokens: Token[], line: number): void {
    const first = tokens.length > 0 ? known(tokens[0]) : undefined;
    if (!first || first.type !== 'paragraph') return;
    const text = plainTokenText(mergeAdjacentText(first.tokens).slice(0, 1));
    const match = ALERT_LIKE_MARKER.exec(text);
    if (match) {
      this.warnings.add(
        `Unknown alert type "[!${match[1]}]"; expected NOTE, TIP, IMPORTANT, WARNING or CAUTION`,
        line
      );
    }
  }

  private checkRule(text: string, line: number): void {
    if (MALFORMED_RULE.test(text.trim())) {
      this.warnings.add('Possible malformed horizontal rule; a rule needs a line of its own', line);
    }
  }

  private checkText(text: string, line: number): void {
    const preview = text.length > 50 ? `${text.slice(0, 50)}...` : text;

    if ((text.match(/\*\*/g) || []).length % 2 === 1) {
      this.warnings.add(`Unclosed bold marker (**) in "${preview}"`, line);
    }
    if ((text.match(/`/g) || []).length % 2 === 1) {
      this.warnings.add(`Unclosed inline code marker (\`) in "${preview}"`, line);
    }
    if (/!\[[^\]]*$/.test(text)) {
      this.warnings.add(`Incomplete image syntax in "${preview}"`, line);
    }

    const bracket = /\[[^\]]+\](?!\()/.exec(text);
    if (
      bracket &&
      !/!\[/.test(text) &&
      !TASK_MARKER.test(bracket[0]) &&
      !ALERT_LIKE_MARKER.test(bracket[0]) &&
      !DECISION_LIKE_MARKER.test(bracket[0])
    ) {
      this.warnings.add(`Incomplete link syntax, missing URL in "${preview}"`, line);
    }

    // Decision markers are only read from inline code
    const stray = /\[decision:[^\]]*\]/.exec(text);
    if (stray) {
      const decision = matchDecisionMarker(stray[0]);
      if (decision && decision.kind === 'invalid') {
        this.warnings.add(
          `Unknown decision state "${decision.letter}" in ${decision.marker}; expected d, a or u`,
          line
        );
      }
      this.warnings.add(
        `Decision marker ${stray[0]} must be written as inline code (\`${stray[0]}\`); it was kept as text`,
        line
      );
    }
  }
}

export class MarkdownParser {
  /**
   * Convert Markdown to ADF. Never throws: input the lexer rejects is kept
   * as plain paragraphs and reported in the warnings.
   */
  parse(markdown: string): ParseResult {
    const warnings = new WarningCollector();
    const source = typeof markdown === 'string' ? markdown.replace(/\r\n?/g, '\n') : '';
    if (source.trim() === '') {
      return { document: emptyDocument(), warnings: [] };
    }

    try {
      const tokens = applyDecisionMarkers(applyAlertPanels(lexer(source, { gfm: true })));
      const content = new TokenMapper(warnings).blocks(tokens, {
        line: 1,
        quoteDepth: 0,
        inListItem: false,
      });
      return {
        document: { version: 1, type: 'doc', content: content.length > 0 ? content : [emptyParagraph()] },
        warnings: warnings.toArray(),
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warnings.add(`Markdown could not be parsed (${reason}); it was saved as plain paragraphs`);
      return { document: fallbackDocument(source), warnings: warnings.toArray() };
    }
  }
}

/**
 * Parse Markdown into an ADF document. Pass `trackWarnings` to also receive
 * the list of problems found along the way.
 */
export function parse(markdown: string): AdfDocument;
export function parse(markdown: string, trackWarnings: false): AdfDocument;
export function parse(markdown: string, trackWarnings: true): ParseResult;
export function parse(markdown: string, trackWarnings: boolean): AdfDocument | ParseResult;
export function parse(markdown: string, trackWarnings = false): AdfDocument | ParseResult {
  const result = new MarkdownParser().parse(markdown);
  return trackWarnings ? result : result.document;
}
