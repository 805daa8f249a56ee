/**
 * Atlassian Document Format (ADF) node types produced by the parser and
 * recognised by the renderer.
 */

export type AdfMarkType = 'strong' | 'em' | 'strike' | 'code';

export interface AdfSimpleMark {
  type: AdfMarkType;
}

export interface AdfLinkMark {
  type: 'link';
  attrs: { href: string };
}

export type AdfMark = AdfSimpleMark | AdfLinkMark;

export interface AdfText {
  type: 'text';
  text: string;
  marks?: AdfMark[];
}

export interface AdfHardBreak {
  type: 'hardBreak';
}

export interface AdfMention {
  type: 'mention';
  attrs: { id: string; text: string };
}

export interface AdfDate {
  type: 'date';
  attrs: { timestamp: string };
}

export type AdfInline = AdfText | AdfHardBreak | AdfMention | AdfDate;

export interface AdfParagraph {
  type: 'paragraph';
  content: AdfInline[];
}

export interface AdfHeading {
  type: 'heading';
  attrs: { level: number };
  content: AdfInline[];
}

export interface AdfListItem {
  type: 'listItem';
  content: AdfBlock[];
}

export interface AdfBulletList {
  type: 'bulletList';
  content: AdfListItem[];
}

export interface AdfOrderedList {
  type: 'orderedList';
  content: AdfListItem[];
}

export type TaskState = 'TODO' | 'DONE';

export interface AdfTaskItem {
  type: 'taskItem';
  attrs: { localId: string; state: TaskState };
  content: AdfInline[];
}

export interface AdfTaskList {
  type: 'taskList';
  attrs: { localId: string };
  content: Array<AdfTaskItem | AdfTaskList>;
}

export interface AdfTableCell {
  type: 'tableCell' | 'tableHeader';
  content: AdfParagraph[];
}

export interface AdfTableRow {
  type: 'tableRow';
  content: AdfTableCell[];
}

export interface AdfTable {
  type: 'table';
  content: AdfTableRow[];
}

export interface AdfCodeBlock {
  type: 'codeBlock';
  attrs?: { language: string };
  content: AdfText[];
}

export interface AdfBlockquote {
  type: 'blockquote';
  content: AdfBlock[];
}

export type PanelType = 'info' | 'note' | 'success' | 'warning' | 'error';

export interface AdfPanel {
  type: 'panel';
  attrs: { panelType: PanelType };
  content: AdfBlock[];
}

export interface AdfRule {
  type: 'rule';
}

export type AdfBlock =
  | AdfParagraph
  | AdfHeading
  | AdfBulletList
  | AdfOrderedList
  | AdfTaskList
  | AdfTable
  | AdfCodeBlock
  | AdfBlockquote
  | AdfPanel
  | AdfRule;

/**
 * Represents a complete ADF document
 */
export interface AdfDocument {
  version: 1;
  type: 'doc';
  content: AdfBlock[];
}

/**
 * Loosely-typed view of a node arriving from the server. Only `type` is
 * guaranteed once it has passed `isAdfNode`; everything else is read through
 * the accessors in `validation.ts`.
 */
export interface RawAdfNode {
  type: string;
  attrs?: unknown;
  content?: unknown[];
  text?: string;
  marks?: unknown[];
}

export interface RawAdfMark {
  type: string;
  attrs?: unknown;
}

/**
 * Block node kinds the renderer dispatches on. Anything else falls through to
 * the wildcard handler, which walks the subtree without adding markup.
 */
export const BLOCK_TYPES = [
  'paragraph',
  'heading',
  'bulletList',
  'orderedList',
  'listItem',
  'taskList',
  'taskItem',
  'table',
  'codeBlock',
  'blockquote',
  'panel',
  'rule',
  'decisionList',
  'decisionItem',
  'mediaSingle',
  'mediaGroup',
] as const;

export type AdfBlockType = (typeof BLOCK_TYPES)[number];

export const INLINE_TYPES = [
  'text',
  'hardBreak',
  'mention',
  'emoji',
  'date',
  'status',
  'inlineCard',
] as const;

export type AdfInlineType = (typeof INLINE_TYPES)[number];

export interface ParseResult {
  document: AdfDocument;
  warnings: string[];
}
