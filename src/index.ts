export { Converter, type ConversionOptions } from './converter';
export { MarkdownParser, parse } from './parser';
export { MarkdownRenderer, plainText, render } from './renderer';
export * from './markers';
export type * from './types';
export { BLOCK_TYPES, INLINE_TYPES } from './types';
export { validateDocument, isAdfDocument, type DocumentValidation } from './validation';
export { WarningCollector } from './warnings';
