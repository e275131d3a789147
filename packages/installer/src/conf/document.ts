import { ProvisionError } from '../errors.js';

/**
 * One line of a line-oriented `key=value` configuration file.
 *
 * `raw` holds the line without its terminator; `cr` records a trailing
 * carriage return so CRLF files render back unchanged.
 */
export type ConfLine =
  | { kind: 'blank'; raw: string; cr: boolean }
  | { kind: 'comment'; raw: string; cr: boolean; entry?: ConfPair }
  | { kind: 'entry'; raw: string; cr: boolean; key: string; value: string }
  | { kind: 'opaque'; raw: string; cr: boolean };

export interface ConfPair {
  key: string;
  value: string;
}

export interface ConfDocument {
  readonly lines: readonly ConfLine[];
  /** Whether the text ends with a line terminator */
  readonly finalNewline: boolean;
}

export interface UpsertOutcome {
  document: ConfDocument;
  /** Zero-based indexes of the lines now holding `key=value` */
  indexes: number[];
  appended: boolean;
  changed: boolean;
}

const KEY_PATTERN = /^[^\s#=]+$/;
// ASCII whitespace only; a BOM or no-break space keeps the line opaque
const LEADER_PATTERN = /^[#\t\n\v\f\r ]*/;

function splitPair(text: string): ConfPair | undefined {
  const eq = text.indexOf('=');
  if (eq <= 0) return undefined;
  const key = text.slice(0, eq);
  if (!KEY_PATTERN.test(key)) return undefined;
  return { key, value: text.slice(eq + 1) };
}

export function parseLine(raw: string, cr = false): ConfLine {
  if (raw.trim() === '') return { kind: 'blank', raw, cr };

  const leader = LEADER_PATTERN.exec(raw)?.[0] ?? '';
  const pair = splitPair(raw.slice(leader.length));

  if (leader.includes('#')) {
    return pair ? { kind: 'comment', raw, cr, entry: pair } : { kind: 'comment', raw, cr };
  }
  if (pair) return { kind: 'entry', raw, cr, key: pair.key, value: pair.value };
  return { kind: 'opaque', raw, cr };
}

export function parseConf(text: string): ConfDocument {
  if (text === '') return { lines: [], finalNewline: true };

  const parts = text.split('\n');
  const finalNewline = text.endsWith('\n');
  if (finalNewline) parts.pop();

  const lines = parts.map((part) => {
    const cr = part.endsWith('\r');
    return parseLine(cr ? part.slice(0, -1) : part, cr);
  });
  return { lines, finalNewline };
}

export function renderConf(doc: ConfDocument): string {
  if (doc.lines.length === 0) return '';
  const body = doc.lines.map((line) => (line.cr ? `${line.raw}\r` : line.raw)).join('\n');
  return doc.finalNewline ? `${body}\n` : body;
}

/** True when the line matches `^[#\s]*key=` (ASCII whitespace), commented or not. */
export function lineMatchesKey(line: ConfLine, key: string): boolean {
  if (line.kind === 'entry') return line.key === key;
  if (line.kind === 'comment') return line.entry?.key === key;
  return false;
}

function assertValidEntry(key: string, value: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new ProvisionError(
      'E_CONF_INVALID_ENTRY',
      `Invalid key "${key}": keys may not be empty or contain whitespace, "#" or "="`,
    );
  }
  if (/[\r\n]/.test(value)) {
    throw new ProvisionError('E_CONF_INVALID_ENTRY', `Value for "${key}" contains a line break`);
  }
}

/**
 * Set `key=value`: every line matching the key (including commented-out
 * ones) is replaced in place by the uncommented canonical form. When no line
 * matches, the entry is appended as the last line.
 */
export function upsertEntry(doc: ConfDocument, key: string, value: string): UpsertOutcome {
  assertValidEntry(key, value);

  const raw = `${key}=${value}`;
  const indexes: number[] = [];
  let changed = false;

  const lines = doc.lines.map((line, index): ConfLine => {
    if (!lineMatchesKey(line, key)) return line;
    indexes.push(index);
    if (line.kind === 'entry' && line.raw === raw) return line;
    changed = true;
    return { kind: 'entry', raw, cr: line.cr, key, value };
  });

  if (indexes.length > 0) {
    return {
      document: changed ? { lines, finalNewline: doc.finalNewline } : doc,
      indexes,
      appended: false,
      changed,
    };
  }

  const last = doc.lines[doc.lines.length - 1];
  lines.push({ kind: 'entry', raw, cr: last?.cr ?? false, key, value });
  return {
    document: { lines, finalNewline: true },
    indexes: [lines.length - 1],
    appended: true,
    changed: true,
  };
}

export function upsert(doc: ConfDocument, key: string, value: string): ConfDocument {
  return upsertEntry(doc, key, value).document;
}

export interface LocatedEntry extends ConfPair {
  /** Zero-based line index */
  index: number;
  commented: boolean;
}

export function findEntries(
  doc: ConfDocument,
  key: string,
  options: { includeCommented?: boolean } = {},
): LocatedEntry[] {
  const found: LocatedEntry[] = [];
  doc.lines.forEach((line, index) => {
    if (line.kind === 'entry' && line.key === key) {
      found.push({ key, value: line.value, index, commented: false });
    } else if (options.includeCommented && line.kind === 'comment' && line.entry?.key === key) {
      found.push({ key, value: line.entry.value, index, commented: true });
    }
  });
  return found;
}

/** Effective value: the last uncommented assignment wins. */
export function getValue(doc: ConfDocument, key: string): string | undefined {
  return findEntries(doc, key).at(-1)?.value;
}
