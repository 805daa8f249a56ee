import {
  alertTypeForPanel,
  alertTypeLabelFor,
  decisionCodeForLabel,
  decisionCodeForState,
  type DecisionCode,
  encodeAlertMarker,
  encodeDate,
  encodeDecisionMarker,
  encodeMention,
  encodeStatus,
} from './markers';
import {
  BLOCK_TYPES,
  INLINE_TYPES,
  type AdfBlockType,
  type AdfInlineType,
  type RawAdfNode,
} from './types';
import { attr, childNodes, isAdfNode, nodeMarks, numberAttr, stringAttr } from './validation';

// Past this depth a subtree is flattened to plain text instead of recursed into
export const MAX_RENDER_DEPTH = 64;

interface RenderContext {
  depth: number;
  // Headings and table cells must stay on one line
  singleLine: boolean;
}

interface RenderedBlock {
  type: string;
  text: string;
}

type BlockRenderer = (node: RawAdfNode, context: RenderContext) => string | null;
type InlineRenderer = (node: RawAdfNode, context: RenderContext) => string;

const LIST_TYPES = new Set(['bulletList', 'orderedList', 'taskList']);

function isBlockType(type: string): type is AdfBlockType {
  return BLOCK_TYPES.some((candidate) => candidate === type);
}

function isInlineType(type: string): type is AdfInlineType {
  return INLINE_TYPES.some((candidate) => candidate === type);
}

function quote(text: string): string {
  return text
    .split('\n')
    .map((line) => (line ? `> ${line}` : '>'))
    .join('\n');
}

function indent(text: string, width: number): string {
  const pad = ' '.repeat(width);
  return text
    .split('\n')
    .map((line) => (line ? pad + line : line))
    .join('\n');
}

function codeSpan(text: string): string {
  const longest = Math.max(0, ...(text.match(/`+/g) || []).map((run) => run.length));
  const ticks = '`'.repeat(longest + 1);
  const padded = text.startsWith('`') || text.endsWith('`') ? ` ${text} ` : text;
  return `${ticks}${padded}${ticks}`;
}

// Characters that would open a block when they start a line of text
const BLOCK_MARKER_START = /^([ \t]*)(#{1,6}(?=\s|$)|[-+](?=\s|$)|>|[=-]+[ \t]*$)/gm;
const ORDERED_MARKER_START = /^([ \t]*\d{1,9})([.)])(?=\s|$)/gm;

/**
 * Backslash-escape text that the parser would otherwise read as emphasis,
 * code or an escape of its own. Intraword underscores are left alone.
 */
function escapeInline(text: string): string {
  return text
    .replace(/\\(?=[!-/:-@[-`{-~])/g, '\\\\')
    .replace(/[*`]/g, '\\$&')
    .replace(/(?<![A-Za-z0-9])_|_(?![A-Za-z0-9])/g, '\\_');
}

function escapeLineStarts(text: string): string {
  return text.replace(BLOCK_MARKER_START, '$1\\$2').replace(ORDERED_MARKER_START, '$1\\$2');
}

function markKey(node: RawAdfNode): string {
  return JSON.stringify(
    nodeMarks(node)
      .map((mark) => `${mark.type}:${JSON.stringify(mark.attrs ?? null)}`)
      .sort()
  );
}

/**
 * Collapse neighbouring text runs that carry the same marks, so `**a****b**`
 * is emitted as `**ab**`.
 */
function mergeTextRuns(nodes: RawAdfNode[]): RawAdfNode[] {
  const merged: RawAdfNode[] = [];
  for (const node of nodes) {
    const previous = merged[merged.length - 1];
    if (
      previous &&
      previous.type === 'text' &&
      node.type === 'text' &&
      markKey(previous) === markKey(node)
    ) {
      merged[merged.length - 1] = { ...previous, text: (previous.text ?? '') + (node.text ?? '') };
    } else {
      merged.push(node);
    }
  }
  return merged;
}

/**
 * Flatten a subtree to its text without recursion
 */
export function plainText(root: RawAdfNode): string {
  const parts: string[] = [];
  const stack: Array<RawAdfNode | string> = [root];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    if (typeof item === 'string') {
      parts.push(item);
      continue;
    }
    if (typeof item.text === 'string') {
      parts.push(item.text);
    } else if (item.type === 'mention' || item.type === 'emoji') {
      parts.push(stringAttr(item, 'text') ?? '');
    }
    const children = childNodes(item);
    if (children.length > 0 && !isInlineType(item.type)) {
      stack.push(' ');
    }
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return parts.join('').replace(/\s+/g, ' ').trim();
}

export class MarkdownRenderer {
  private readonly blockRenderers: { [K in AdfBlockType]: BlockRenderer } = {
    paragraph: (node, context) => escapeLineStarts(this.renderInline(childNodes(node), context)),
    heading: (node, context) => this.renderHeading(node, context),
    bulletList: (node, context) => this.renderList(node, context, false),
    orderedList: (node, context) => this.renderList(node, context, true),
    listItem: (node, context) => this.renderListItem(childNodes(node), '- ', 2, context),
    taskList: (node, context) => this.renderTaskList(node, context),
    taskItem: (node, context) => this.renderTaskItem(node, context),
    table: (node, context) => this.renderTable(node, context),
    codeBlock: (node) => this.renderCodeBlock(node),
    blockquote: (node, context) => this.renderBlockquote(node, context),
    panel: (node, context) => this.renderPanel(node, context),
    rule: () => '---',
    decisionList: (node, context) => this.renderDecisionList(childNodes(node), context),
    decisionItem: (node, context) => this.renderDecisionList([node], context),
    mediaSingle: (node) => this.renderMedia(node),
    mediaGroup: (node) => this.renderMedia(node),
  };

  private readonly inlineRenderers: { [K in AdfInlineType]: InlineRenderer } = {
    text: (node, context) => this.renderText(node, context),
    hardBreak: (_node, context) => (context.singleLine ? ' ' : '\\\n'),
    mention: (node) => this.renderMention(node),
    emoji: (node) => stringAttr(node, 'text') ?? stringAttr(node, 'shortName') ?? '',
    date: (node) => codeSpan(encodeDate(attr(node, 'timestamp'))),
    status: (node) =>
      codeSpan(encodeStatus(attr(node, 'color'), stringAttr(node, 'text') ?? '')),
    inlineCard: (node) => {
      const url = stringAttr(node, 'url');
      return url ? `[${url}](${url})` : '';
    },
  };

  constructor(private readonly baseUrl: string | null = null) {}

  /**
   * Render an ADF document (or a bare node / node array) as Markdown.
   * Never throws: nodes that cannot be read are skipped.
   */
  render(value: unknown): string {
    const blocks = this.renderBlocks(this.topLevelNodes(value), { depth: 0, singleLine: false });
    return this.joinBlocks(blocks, false);
  }

  private topLevelNodes(value: unknown): RawAdfNode[] {
    if (Array.isArray(value)) {
      return value.filter((node): node is RawAdfNode => isAdfNode(node));
    }
    if (!isAdfNode(value)) {
      return [];
    }
    return value.type === 'doc' ? childNodes(value) : [value];
  }

  private renderBlocks(nodes: RawAdfNode[], context: RenderContext): RenderedBlock[] {
    const blocks: RenderedBlock[] = [];
    let inlineRun: RawAdfNode[] = [];

    const flush = () => {
      if (inlineRun.length === 0) return;
      const text = escapeLineStarts(this.renderInline(inlineRun, context));
      if (text.trim()) {
        blocks.push({ type: 'paragraph', text });
      }
      inlineRun = [];
    };

    for (const node of nodes) {
      if (isInlineType(node.type)) {
        inlineRun.push(node);
        continue;
      }
      flush();
      const text = this.renderBlock(node, context);
      if (text !== null && text.trim() !== '') {
        blocks.push({ type: node.type, text });
      }
    }
    flush();

    return blocks;
  }

  /**
   * Join rendered blocks. Top-level blocks are always separated by a blank
   * line; inside a list item a nested list hugs the line above it.
   */
  private joinBlocks(blocks: RenderedBlock[], tight: boolean): string {
    return blocks
      .map((block, index) => {
        if (index === 0) return block.text;
        const previous = blocks[index - 1];
        const hug = tight && LIST_TYPES.has(block.type) && previous.type !== 'table';
        return (hug ? '\n' : '\n\n') + block.text;
      })
      .join('');
  }

  private renderBlock(node: RawAdfNode, context: RenderContext): string | null {
    if (context.depth > MAX_RENDER_DEPTH) {
      return plainText(node);
    }
    if (isBlockType(node.type)) {
      return this.blockRenderers[node.type](node, context);
    }
    // Unknown wrapper: no markup of its own, but keep what it contains
    if (node.content) {
      const inner = this.renderBlocks(childNodes(node), { ...context, depth: context.depth + 1 });
      return this.joinBlocks(inner, false);
    }
    return typeof node.text === 'string' ? node.text : null;
  }

  private renderHeading(node: RawAdfNode, context: RenderContext): string {
    const level = Math.min(6, Math.max(1, Math.trunc(numberAttr(node, 'level') ?? 1)));
    const text = this.renderInline(childNodes(node), { ...context, singleLine: true }).trim();
    return `${'#'.repeat(level)} ${text}`;
  }

  private renderList(node: RawAdfNode, context: RenderContext, ordered: boolean): string {
    const inner = { ...context, depth: context.depth + 1 };
    let index = 0;
    const items: string[] = [];

    for (const child of childNodes(node)) {
      if (child.type === 'listItem') {
        index += 1;
        const marker = ordered ? `${index}. ` : '- ';
        const width = ordered ? Math.max(4, marker.length) : 2;
        items.push(this.renderListItem(childNodes(child), marker, width, inner));
        continue;
      }
      // A list directly inside a list belongs to the item above it
      const nested = this.renderBlock(child, inner);
      if (nested) {
        items.push(indent(nested, ordered ? 4 : 2));
      }
    }

    return items.join('\n');
  }

  private renderListItem(
    children: RawAdfNode[],
    marker: string,
    width: number,
    context: RenderContext
  ): string {
    const body = this.joinBlocks(
      this.renderBlocks(children, { ...context, depth: context.depth + 1 }),
      true
    );
    if (!body) {
      return marker.trimEnd();
    }
    const [first, ...rest] = body.split('\n');
    const tail = rest.length > 0 ? `\n${indent(rest.join('\n'), width)}` : '';
    return `${marker}${first}${tail}`;
  }

  private renderTaskList(node: RawAdfNode, context: RenderContext): string {
    const inner = { ...context, depth: context.depth + 1 };
    return childNodes(node)
      .map((child) => {
        if (child.type === 'taskItem') {
          return this.renderTaskItem(child, inner);
        }
        // Nested task lists sit beside the item they belong to
        const nested = this.renderBlock(child, inner);
        return nested ? indent(nested, 2) : '';
      })
      .filter((item) => item !== '')
      .join('\n');
  }

  private renderTaskItem(node: RawAdfNode, context: RenderContext): string {
    const done = stringAttr(node, 'state') === 'DONE';
    return this.renderListItem(childNodes(node), done ? '- [x] ' : '- [ ] ', 2, context);
  }

  private renderTable(node: RawAdfNode, context: RenderContext): string | null {
    const rows = childNodes(node)
      .filter((row) => row.type === 'tableRow')
      .map((row) =>
        childNodes(row)
          .filter((cell) => cell.type === 'tableCell' || cell.type === 'tableHeader')
          .map((cell) => this.renderCell(cell, context))
      )
      .filter((cells) => cells.length > 0);

    if (rows.length === 0) {
      return null;
    }

    const columns = Math.max(...rows.map((cells) => cells.length));
    const lines = rows.map((cells) => {
      const padded = [...cells, ...Array.from({ length: columns - cells.length }, () => '')];
      return `| ${padded.join(' | ')} |`;
    });

    // GFM needs a delimiter row after the first row, header or not
    lines.splice(1, 0, `|${'-|'.repeat(columns)}`);
    return lines.join('\n');
  }

  private renderCell(cell: RawAdfNode, context: RenderContext): string {
    const cellContext = { depth: context.depth + 1, singleLine: true };
    return childNodes(cell)
      .map((child) => {
        if (child.type === 'paragraph' || child.type === 'heading') {
          return this.renderInline(childNodes(child), cellContext);
        }
        if (isInlineType(child.type)) {
          return this.renderInlineNode(child, cellContext);
        }
        // Lists and other blocks cannot live in a GFM cell
        return plainText(child);
      })
      .map((part) => part.trim())
      .filter((part) => part !== '')
      .join(' ')
      .replace(/\s*\n\s*/g, ' ')
      .replace(/\|/g, '\\|');
  }

  private renderCodeBlock(node: RawAdfNode): string {
    const language = stringAttr(node, 'language') ?? '';
    const text = childNodes(node)
      .map((child) => child.text ?? '')
      .join('')
      .replace(/\n$/, '');
    const fences = (text.match(/^ {0,3}`{3,}/gm) || []).map((run) => run.trim().length);
    const fence = '`'.repeat(Math.max(3, ...fences.map((length) => length + 1)));
    return `${fence}${language}\n${text}\n${fence}`;
  }

  private renderBlockquote(node: RawAdfNode, context: RenderContext): string {
    const inner = { ...context, depth: context.depth + 1 };
    const children = childNodes(node);
    const parts: RenderedBlock[] = [];

    for (let i = 0; i < children.length; i++) {
      const code = this.decisionLabelCode(children[i]);
      if (code) {
        // A parsed decision: label paragraph followed by its content paragraph
        const next = children[i + 1];
        let content = '';
        if (next && next.type === 'paragraph' && this.decisionLabelCode(next) === null) {
          content = this.renderInline(childNodes(next), inner);
          i += 1;
        }
        parts.push({ type: 'paragraph', text: this.decisionLine(code, content) });
        continue;
      }
      parts.push(...this.renderBlocks([children[i]], inner));
    }

    return quote(this.joinBlocks(parts, false));
  }

  private renderPanel(node: RawAdfNode, context: RenderContext): string {
    const alert = alertTypeForPanel(attr(node, 'panelType'));
    let children = childNodes(node);
    if (children.length > 0 && this.isBoldParagraph(children[0], alertTypeLabelFor(alert))) {
      children = children.slice(1);
    }
    const body = this.joinBlocks(
      this.renderBlocks(children, { ...context, depth: context.depth + 1 }),
      false
    );
    const marker = encodeAlertMarker(alert);
    return quote(body ? `${marker}\n${body}` : marker);
  }

  private renderDecisionList(items: RawAdfNode[], context: RenderContext): string {
    const inner = { ...context, depth: context.depth + 1 };
    const lines = items
      .filter((item) => item.type === 'decisionItem')
      .map((item) => {
        const code = decisionCodeForState(attr(item, 'state'));
        const text = this.joinBlocks(this.renderBlocks(childNodes(item), inner), false);
        return this.decisionLine(code, text.trim());
      });
    return lines.length > 0 ? quote(lines.join('\n\n')) : '';
  }

  private decisionLine(code: DecisionCode, content: string): string {
    const marker = codeSpan(encodeDecisionMarker(code));
    return content ? `${marker} ${content}` : marker;
  }

  private decisionLabelCode(node: RawAdfNode): DecisionCode | null {
    const text = this.boldParagraphText(node);
    return text === null ? null : decisionCodeForLabel(text);
  }

  private isBoldParagraph(node: RawAdfNode, label: string): boolean {
    return this.boldParagraphText(node) === label;
  }

  private boldParagraphText(node: RawAdfNode): string | null {
    if (node.type !== 'paragraph') return null;
    const children = childNodes(node);
    if (children.length !== 1) return null;
    const [only] = children;
    if (only.type !== 'text' || typeof only.text !== 'string') return null;
    return nodeMarks(only).some((mark) => mark.type === 'strong') ? only.text : null;
  }

  private renderMedia(node: RawAdfNode): string {
    const media = node.type === 'media' ? [node] : childNodes(node).filter((c) => c.type === 'media');
    return media
      .map((item) => `*(See file "${stringAttr(item, 'alt') || 'unknown'}" in attachments tab)*`)
      .join('\n\n');
  }

  private renderInline(nodes: RawAdfNode[], context: RenderContext): string {
    return mergeTextRuns(nodes)
      .map((node) => this.renderInlineNode(node, context))
      .join('');
  }

  private renderInlineNode(node: RawAdfNode, context: RenderContext): string {
    if (context.depth > MAX_RENDER_DEPTH) {
      return plainText(node);
    }
    if (isInlineType(node.type)) {
      return this.inlineRenderers[node.type](node, context);
    }
    if (isBlockType(node.type)) {
      return plainText(node);
    }
    if (typeof node.text === 'string') {
      return node.text;
    }
    return this.renderInline(childNodes(node), { ...context, depth: context.depth + 1 });
  }

  /**
   * Emit a text run with its marks. Delimiters nest in a fixed order
   * (bold, italic, strike, code from the outside in) and any whitespace at
   * the edges of the run stays outside them.
   */
  private renderText(node: RawAdfNode, context: RenderContext): string {
    const raw = node.text ?? '';
    const text = context.singleLine ? raw.replace(/\n/g, ' ') : raw;
    const marks = nodeMarks(node);
    const has = (type: string) => marks.some((mark) => mark.type === type);

    const mention = marks.find((mark) => mark.type === 'mention');
    if (mention) {
      const accountId = stringAttr(mention, 'id') ?? stringAttr(mention, 'accountId');
      if (accountId) {
        return encodeMention(text, accountId, this.baseUrl);
      }
    }

    const edges = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
    const lead = edges ? edges[1] : '';
    const body = edges ? edges[2] : text;
    const trail = edges ? edges[3] : '';
    if (!body) {
      return text;
    }

    let out = has('code') ? codeSpan(body) : escapeInline(body);
    if (has('strike')) out = `~~${out}~~`;
    if (has('em')) out = `*${out}*`;
    if (has('strong')) out = `**${out}**`;

    const link = marks.find((mark) => mark.type === 'link');
    const href = link ? stringAttr(link, 'href') : undefined;
    if (href) {
      out = `[${out}](${/[\s()]/.test(href) ? `<${href}>` : href})`;
    }

    return `${lead}${out}${trail}`;
  }

  private renderMention(node: RawAdfNode): string {
    const accountId = stringAttr(node, 'id') ?? '';
    const name = stringAttr(node, 'text') ?? stringAttr(node, 'displayName') ?? '';
    if (!accountId) {
      return name;
    }
    return encodeMention(name || accountId, accountId, this.baseUrl);
  }
}

/**
 * Render ADF as Markdown. `baseUrl` is used to build mention links; without
 * it mentions are emitted as plain `@Name` text.
 */
export function render(adf: unknown, baseUrl: string | null = null): string {
  return new MarkdownRenderer(baseUrl).render(adf);
}
