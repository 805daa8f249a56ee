import Ajv from 'ajv';
import type { AdfDocument, RawAdfMark, RawAdfNode } from './types';

const ajv = new Ajv({ allErrors: true });

// Only the envelope is checked here; children are validated as the renderer
// reaches them, so one bad node never hides its siblings.
const nodeSchema = {
  type: 'object',
  required: ['type'],
  properties: {
    type: { type: 'string', minLength: 1 },
    content: { type: 'array' },
    text: { type: 'string' },
    marks: { type: 'array' },
  },
};

const markSchema = {
  type: 'object',
  required: ['type'],
  properties: {
    type: { type: 'string', minLength: 1 },
  },
};

const documentSchema = {
  type: 'object',
  required: ['type', 'version', 'content'],
  properties: {
    type: { const: 'doc' },
    version: { const: 1 },
    content: {
      type: 'array',
      items: nodeSchema,
    },
  },
};

export const isAdfNode = ajv.compile<RawAdfNode>(nodeSchema);
export const isAdfMark = ajv.compile<RawAdfMark>(markSchema);
export const isAdfDocument = ajv.compile<AdfDocument>(documentSchema);

export interface DocumentValidation {
  valid: boolean;
  errors: string[];
}

/**
 * Validate the document envelope and its top-level blocks
 */
export function validateDocument(value: unknown): DocumentValidation {
  if (isAdfDocument(value)) {
    return { valid: true, errors: [] };
  }

  const errors = (isAdfDocument.errors || []).map((err) =>
    `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`.trim()
  );
  return { valid: false, errors };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function attr(node: { attrs?: unknown }, key: string): unknown {
  return isRecord(node.attrs) ? node.attrs[key] : undefined;
}

export function stringAttr(node: { attrs?: unknown }, key: string): string | undefined {
  const value = attr(node, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function numberAttr(node: { attrs?: unknown }, key: string): number | undefined {
  const value = attr(node, key);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function childNodes(node: RawAdfNode): RawAdfNode[] {
  return (node.content || []).filter((child): child is RawAdfNode => isAdfNode(child));
}

export function nodeMarks(node: RawAdfNode): RawAdfMark[] {
  return (node.marks || []).filter((mark): mark is RawAdfMark => isAdfMark(mark));
}
