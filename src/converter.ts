import { MarkdownParser } from './parser';
import { MarkdownRenderer } from './renderer';
import type { AdfDocument, ParseResult } from './types';
import { type DocumentValidation, validateDocument } from './validation';

export interface ConversionOptions {
  baseUrl?: string | null;
}

/**
 * Both conversion directions behind one object, configured once with the
 * site base URL used for mention links.
 */
export class Converter {
  private readonly renderer: MarkdownRenderer;
  private readonly parser = new MarkdownParser();

  constructor(options: ConversionOptions = {}) {
    this.renderer = new MarkdownRenderer(options.baseUrl ?? null);
  }

  /**
   * Convert an ADF document to Markdown
   */
  toMarkdown(adf: unknown): string {
    return this.renderer.render(adf);
  }

  /**
   * Convert Markdown to ADF, returning the document and any warnings
   */
  toADF(markdown: string): ParseResult {
    return this.parser.parse(markdown);
  }

  validate(adf: unknown): DocumentValidation {
    return validateDocument(adf);
  }

  /**
   * ADF → Markdown → ADF. Handy for checking what a document loses on the
   * way through Markdown.
   */
  roundTrip(adf: AdfDocument): ParseResult {
    return this.toADF(this.toMarkdown(adf));
  }
}
