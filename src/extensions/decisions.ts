import type { Token, Tokens } from 'marked';
import { decisionLabelFor, matchDecisionMarker } from '../markers';
import {
  type DecisionToken,
  known,
  labelParagraph,
  mergeAdjacentText,
  paragraphToken,
  rewriteBlockquotes,
  textToken,
  trimLeadingWhitespace,
} from './tokens';

/**
 * Tag block quotes whose paragraphs open with `` `[decision:X]` ``.
 *
 * Each such paragraph becomes a `**LABEL**` paragraph followed by the text
 * after the marker. Paragraphs without a marker are left alone, and so are
 * markers with an unknown letter; the parser reports those.
 */
export function applyDecisionMarkers(tokens: Token[]): Token[] {
  return rewriteBlockquotes(tokens, (quote) => [toDecision(quote) ?? quote]);
}

function toDecision(quote: Tokens.Blockquote): DecisionToken | null {
  let found = false;
  const children = quote.tokens.flatMap((child): Token[] => {
    const block = known(child);
    if (block.type !== 'paragraph') return [child];
    const split = splitDecision(block);
    if (!split) return [child];
    found = true;
    return split;
  });

  return found ? { type: 'decision', raw: quote.raw, tokens: children } : null;
}

function splitDecision(paragraph: Tokens.Paragraph): Token[] | null {
  const inline = trimLeadingWhitespace(mergeAdjacentText(paragraph.tokens));
  const lead = inline.length > 0 ? known(inline[0]) : undefined;
  if (!lead || lead.type !== 'codespan') return null;

  const match = matchDecisionMarker(lead.text);
  if (!match || match.kind !== 'decision') return null;

  // Text left inside the code span after the marker is plain content
  const content = trimLeadingWhitespace([textToken(match.rest), ...inline.slice(1)]);

  const blocks: Token[] = [labelParagraph(decisionLabelFor(match.code))];
  if (content.length > 0) {
    blocks.push(paragraphToken(content, paragraph.raw));
  }
  return blocks;
}
