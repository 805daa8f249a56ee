import type { PanelType } from './types';

/**
 * Inline marker codec. Every helper here is pure: the renderer and the parser
 * both go through these so the two directions agree on the wire shapes.
 */

export type DecisionCode = 'd' | 'a' | 'u';

export type AlertType = 'NOTE' | 'TIP' | 'IMPORTANT' | 'WARNING' | 'CAUTION';

const DECISION_LABELS: Record<DecisionCode, string> = {
  d: 'DECIDED',
  a: 'ACKNOWLEDGED',
  u: 'UP FOR DISCUSSION',
};

// ADF decisionItem.state values
const DECISION_STATES: Record<string, DecisionCode> = {
  DECIDED: 'd',
  ACKNOWLEDGED: 'a',
  UP_FOR_DISCUSSION: 'u',
};

const ALERT_LABELS: Record<AlertType, string> = {
  NOTE: 'Note',
  TIP: 'Tip',
  IMPORTANT: 'Important',
  WARNING: 'Warning',
  CAUTION: 'Caution',
};

const ALERT_PANELS: Record<AlertType, PanelType> = {
  NOTE: 'info',
  TIP: 'success',
  IMPORTANT: 'note',
  WARNING: 'warning',
  CAUTION: 'error',
};

const STATUS_COLORS: Record<string, string> = {
  neutral: 'n',
  red: 'r',
  blue: 'b',
  green: 'g',
  yellow: 'y',
  purple: 'p',
  teal: 't',
};

const MENTION_PATH = '/jira/people/';
const MENTION_HREF = /\/jira\/people\/([^/?#\s]+)\/?$/;

export const ALERT_MARKER = /^\[!(NOTE|TIP|IMPORTANT|WARNING|CAUTION)\]/i;
// Anything shaped like an alert marker, used to report unknown types
export const ALERT_LIKE_MARKER = /^\[!([A-Za-z]+)\]/;
export const DECISION_MARKER = /^\[decision:([dau])\]/;
export const DECISION_LIKE_MARKER = /^\[decision:([^\]]*)\]/;
export const STATUS_MARKER = /^\[status:([a-z])\]([\s\S]*)$/;
export const DATE_MARKER = /^\[date\]([\s\S]*)$/;

function isDecisionCode(value: string): value is DecisionCode {
  return value === 'd' || value === 'a' || value === 'u';
}

function isAlertType(value: string): value is AlertType {
  return value in ALERT_LABELS;
}

/**
 * Build the Markdown form of a user mention. Without a base URL the mention
 * cannot be resolved, so it degrades to plain `@Name` text.
 */
export function encodeMention(
  displayName: string,
  accountId: string,
  baseUrl: string | null
): string {
  const name = displayName.startsWith('@') ? displayName : `@${displayName}`;
  if (!baseUrl) {
    return name;
  }
  return `[${name}](${baseUrl.replace(/\/+$/, '')}${MENTION_PATH}${accountId})`;
}

/**
 * Extract the account id from a profile link, or null for an ordinary link
 */
export function decodeMention(href: string): string | null {
  const match = MENTION_HREF.exec(href);
  if (!match) {
    return null;
  }
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return match[1];
  }
}

export function decisionLabelFor(code: DecisionCode): string {
  return DECISION_LABELS[code];
}

export function decisionCodeForLabel(label: string): DecisionCode | null {
  const entry = Object.entries(DECISION_LABELS).find(([, value]) => value === label.trim());
  return entry && isDecisionCode(entry[0]) ? entry[0] : null;
}

export function decisionCodeForState(state: unknown): DecisionCode {
  return typeof state === 'string' && state in DECISION_STATES ? DECISION_STATES[state] : 'd';
}

export function encodeDecisionMarker(code: DecisionCode): string {
  return `[decision:${code}]`;
}

export type DecisionMatch =
  | { kind: 'decision'; code: DecisionCode; rest: string }
  | { kind: 'invalid'; marker: string; letter: string };

/**
 * Match a decision marker at the start of an inline code span
 */
export function matchDecisionMarker(text: string): DecisionMatch | null {
  const match = DECISION_MARKER.exec(text);
  if (match && isDecisionCode(match[1])) {
    return { kind: 'decision', code: match[1], rest: text.slice(match[0].length) };
  }
  const loose = DECISION_LIKE_MARKER.exec(text);
  if (loose) {
    return { kind: 'invalid', marker: loose[0], letter: loose[1] };
  }
  return null;
}

export function alertTypeLabelFor(type: AlertType): string {
  return ALERT_LABELS[type];
}

export function alertTypeForLabel(label: string): AlertType | null {
  const entry = Object.entries(ALERT_LABELS).find(
    ([, value]) => value.toLowerCase() === label.trim().toLowerCase()
  );
  return entry && isAlertType(entry[0]) ? entry[0] : null;
}

export function panelTypeForAlert(type: AlertType): PanelType {
  return ALERT_PANELS[type];
}

export function alertTypeForPanel(panelType: unknown): AlertType {
  const entry = Object.entries(ALERT_PANELS).find(([, value]) => value === panelType);
  return entry && isAlertType(entry[0]) ? entry[0] : 'NOTE';
}

export function encodeAlertMarker(type: AlertType): string {
  return `[!${type}]`;
}

/**
 * Match `[!TYPE]` at the start of a text, case-insensitively
 */
export function matchAlertMarker(text: string): { type: AlertType; marker: string } | null {
  const match = ALERT_MARKER.exec(text);
  if (!match) {
    return null;
  }
  const type = match[1].toUpperCase();
  return isAlertType(type) ? { type, marker: match[0] } : null;
}

export function statusCodeForColor(color: unknown): string {
  return typeof color === 'string' && color in STATUS_COLORS ? STATUS_COLORS[color] : 'n';
}

export function encodeStatus(color: unknown, label: string): string {
  return `[status:${statusCodeForColor(color)}]${label || '[no status]'}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format an ADF date timestamp (epoch milliseconds) as `[date]YYYY-MM-DD`.
 * Dates are calendar days, so the UTC day is used.
 */
export function encodeDate(timestamp: unknown): string {
  if (timestamp === undefined || timestamp === null || timestamp === '') {
    return '[date][no date]';
  }
  const millis = Number(timestamp);
  const date = new Date(millis);
  if (!Number.isFinite(millis) || Number.isNaN(date.getTime())) {
    return '[date][invalid date]';
  }
  return `[date]${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export type DateMatch = { kind: 'date'; timestamp: string } | { kind: 'invalid'; value: string };

/**
 * Match a date chip and convert it back to an epoch-milliseconds timestamp
 */
export function matchDateMarker(text: string): DateMatch | null {
  const match = DATE_MARKER.exec(text);
  if (!match) {
    return null;
  }
  const value = match[1].trim();
  const parts = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!parts) {
    return { kind: 'invalid', value };
  }
  const [year, month, day] = [Number(parts[1]), Number(parts[2]), Number(parts[3])];
  const millis = Date.UTC(year, month - 1, day);
  const check = new Date(millis);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return { kind: 'invalid', value };
  }
  return { kind: 'date', timestamp: String(millis) };
}
