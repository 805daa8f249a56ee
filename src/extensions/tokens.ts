import type { Token, Tokens } from 'marked';
import type { AlertType } from '../markers';

/**
 * A block quote the alert pass recognised as `[!TYPE]`
 */
export type AlertToken = {
  type: 'alert';
  raw: string;
  alert: AlertType;
  tokens: Token[];
};

/**
 * A block quote holding one or more `[decision:X]` paragraphs
 */
export type DecisionToken = {
  type: 'decision';
  raw: string;
  tokens: Token[];
};

// Token kinds the default lexer emits
type LexerToken =
  | Tokens.Blockquote
  | Tokens.Br
  | Tokens.Code
  | Tokens.Codespan
  | Tokens.Def
  | Tokens.Del
  | Tokens.Em
  | Tokens.Escape
  | Tokens.Heading
  | Tokens.Hr
  | Tokens.HTML
  | Tokens.Image
  | Tokens.Link
  | Tokens.List
  | Tokens.ListItem
  | Tokens.Paragraph
  | Tokens.Space
  | Tokens.Strong
  | Tokens.Table
  | Tokens.Tag
  | Tokens.Text;

export type ConverterToken = LexerToken | AlertToken | DecisionToken;

/**
 * marked types lexer output as `Token`, which folds in `Tokens.Generic`.
 * Without registered extensions the lexer only emits the built-in kinds plus
 * the two produced by our own passes, so this is where the union is closed.
 */
export function known(token: Token): ConverterToken {
  return token as ConverterToken;
}

export function newlines(text: string): number {
  return (text.match(/\n/g) || []).length;
}

export function textToken(text: string): Tokens.Text {
  return { type: 'text', raw: text, text };
}

export function paragraphToken(tokens: Token[], raw?: string): Tokens.Paragraph {
  const text = tokens.map((token) => token.raw).join('');
  return { type: 'paragraph', raw: raw ?? text, text, tokens };
}

/**
 * The synthesized `**Label**` paragraph that opens an alert or decision
 */
export function labelParagraph(label: string): Tokens.Paragraph {
  const strong: Tokens.Strong = {
    type: 'strong',
    raw: `**${label}**`,
    text: label,
    tokens: [textToken(label)],
  };
  return { type: 'paragraph', raw: strong.raw, text: strong.raw, tokens: [strong] };
}

/**
 * Join neighbouring plain text tokens. The lexer emits `[` of an unmatched
 * reference link as its own token, so markers can arrive split.
 */
export function mergeAdjacentText(tokens: Token[]): Token[] {
  const merged: Token[] = [];
  for (const token of tokens) {
    const current = known(token);
    const last = merged[merged.length - 1];
    const previous = last === undefined ? undefined : known(last);
    if (
      previous &&
      previous.type === 'text' &&
      !previous.tokens &&
      current.type === 'text' &&
      !current.tokens
    ) {
      merged[merged.length - 1] = {
        type: 'text',
        raw: previous.raw + current.raw,
        text: previous.text + current.text,
      };
    } else {
      merged.push(token);
    }
  }
  return merged;
}

/**
 * Drop line breaks and blank text at the start of an inline run, then trim
 * the leading whitespace of the first text token.
 */
export function trimLeadingWhitespace(tokens: Token[]): Token[] {
  let index = 0;
  while (index < tokens.length) {
    const token = known(tokens[index]);
    const blank = token.type === 'text' && !token.tokens && token.text.trim() === '';
    if (token.type !== 'br' && !blank) break;
    index += 1;
  }

  const rest = tokens.slice(index);
  const first = rest.length > 0 ? known(rest[0]) : undefined;
  if (first && first.type === 'text' && !first.tokens) {
    return [textToken(first.text.replace(/^\s+/, '')), ...rest.slice(1)];
  }
  return rest;
}

/**
 * Rebuild a token list, handing every block quote to `visit` once its own
 * children have been rewritten. The visitor returns the tokens that take the
 * quote's place, so a pass may grow or shrink the list without index fixes.
 */
export function rewriteBlockquotes(
  tokens: Token[],
  visit: (quote: Tokens.Blockquote) => Token[]
): Token[] {
  return tokens.flatMap((token): Token[] => {
    const current = known(token);
    switch (current.type) {
      case 'blockquote':
        return visit({ ...current, tokens: rewriteBlockquotes(current.tokens, visit) });
      case 'alert':
      case 'decision':
        return [{ ...current, tokens: rewriteBlockquotes(current.tokens, visit) }];
      case 'list':
        return [
          {
            ...current,
            items: current.items.map((item) => ({
              ...item,
              tokens: rewriteBlockquotes(item.tokens, visit),
            })),
          },
        ];
      default:
        return [token];
    }
  });
}
