import type { Token, Tokens } from 'marked';
import { alertTypeLabelFor, matchAlertMarker } from '../markers';
import {
  type AlertToken,
  known,
  labelParagraph,
  mergeAdjacentText,
  paragraphToken,
  rewriteBlockquotes,
  textToken,
  trimLeadingWhitespace,
} from './tokens';

/**
 * Turn `> [!TYPE]` block quotes into alert tokens.
 *
 * The marker has to open the first paragraph of the quote. The quote's
 * content gets a `**Label**` paragraph in front and loses the marker, along
 * with a `**Label:**` prefix repeating the same label.
 */
export function applyAlertPanels(tokens: Token[]): Token[] {
  return rewriteBlockquotes(tokens, (quote) => [toAlert(quote) ?? quote]);
}

function toAlert(quote: Tokens.Blockquote): AlertToken | null {
  const [first, ...rest] = quote.tokens;
  const opening = first === undefined ? undefined : known(first);
  if (!opening || opening.type !== 'paragraph') return null;

  const inline = mergeAdjacentText(opening.tokens);
  const lead = inline.length > 0 ? known(inline[0]) : undefined;
  if (!lead || lead.type !== 'text' || lead.tokens) return null;

  const match = matchAlertMarker(lead.text);
  if (!match) return null;

  const label = alertTypeLabelFor(match.type);
  const afterMarker = trimLeadingWhitespace([
    textToken(lead.text.slice(match.marker.length)),
    ...inline.slice(1),
  ]);
  const content = dropRepeatedLabel(afterMarker, label);

  const blocks: Token[] = [labelParagraph(label)];
  if (content.length > 0) {
    blocks.push(paragraphToken(content, opening.raw));
  }

  return { type: 'alert', raw: quote.raw, alert: match.type, tokens: [...blocks, ...rest] };
}

function dropRepeatedLabel(tokens: Token[], label: string): Token[] {
  const head = tokens.length > 0 ? known(tokens[0]) : undefined;
  if (!head || head.type !== 'strong') return tokens;

  const prefix = head.text.trim().replace(/\s*:$/, '');
  if (prefix.toLowerCase() !== label.toLowerCase()) return tokens;

  return trimLeadingWhitespace(tokens.slice(1));
}
