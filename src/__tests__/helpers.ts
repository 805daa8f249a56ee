import type { AdfMark, AdfParagraph, AdfText } from '../types';

export const strong: AdfMark = { type: 'strong' };
export const em: AdfMark = { type: 'em' };
export const strike: AdfMark = { type: 'strike' };
export const code: AdfMark = { type: 'code' };

export function link(href: string): AdfMark {
  return { type: 'link', attrs: { href } };
}

export function t(text: string, ...marks: AdfMark[]): AdfText {
  return marks.length > 0 ? { type: 'text', text, marks } : { type: 'text', text };
}

export function p(...content: AdfParagraph['content']): AdfParagraph;
export function p(...content: unknown[]): { type: 'paragraph'; content: unknown[] };
export function p(...content: unknown[]): { type: 'paragraph'; content: unknown[] } {
  return { type: 'paragraph', content };
}

export function doc(...content: unknown[]) {
  return { type: 'doc', version: 1, content };
}
