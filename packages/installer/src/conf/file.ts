import fs from 'node:fs';
import { ProvisionError } from '../errors.js';
import { type ConfDocument, findEntries, parseConf, renderConf, upsertEntry } from './document.js';

export interface ConfSetting {
  key: string;
  value: string;
}

export type ConfAction = 'rewritten' | 'appended' | 'unchanged';

export interface AppliedSetting extends ConfSetting {
  action: ConfAction;
  /** 1-based line numbers holding the entry after the edit */
  lineNumbers: number[];
}

export interface ApplyResult {
  path: string;
  changed: boolean;
  settings: AppliedSetting[];
}

export interface ConfExcerptLine {
  lineNumber: number;
  text: string;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function readConfText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ProvisionError('E_CONF_NOT_FOUND', `Configuration file not found: ${filePath}`, {
        cause: err,
      });
    }
    throw err;
  }
}

export function loadConfFile(filePath: string): ConfDocument {
  return parseConf(readConfText(filePath));
}

/**
 * Copy `filePath` to `<filePath>.bak.<timestamp>`, keeping mode, timestamps
 * and (when running as root) ownership. Returns the backup path.
 */
export function backupConfFile(filePath: string, timestamp: string): string {
  const backupPath = `${filePath}.bak.${timestamp}`;
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ProvisionError('E_CONF_NOT_FOUND', `Configuration file not found: ${filePath}`, {
        cause: err,
      });
    }
    throw err;
  }

  fs.copyFileSync(filePath, backupPath);
  fs.chmodSync(backupPath, stat.mode);
  fs.utimesSync(backupPath, stat.atime, stat.mtime);
  if (process.getuid?.() === 0) {
    fs.chownSync(backupPath, stat.uid, stat.gid);
  }
  return backupPath;
}

/**
 * Upsert each setting in order and write the file once, only if its text
 * changed. No locking: one writer per run.
 */
export function applyConfSettings(filePath: string, settings: readonly ConfSetting[]): ApplyResult {
  const original = readConfText(filePath);
  let doc = parseConf(original);
  const applied: AppliedSetting[] = [];

  for (const { key, value } of settings) {
    const outcome = upsertEntry(doc, key, value);
    doc = outcome.document;
    let action: ConfAction = 'unchanged';
    if (outcome.appended) action = 'appended';
    else if (outcome.changed) action = 'rewritten';
    applied.push({ key, value, action, lineNumbers: outcome.indexes.map((i) => i + 1) });
  }

  const rendered = renderConf(doc);
  const changed = rendered !== original;
  if (changed) {
    fs.writeFileSync(filePath, rendered, 'utf-8');
  }
  return { path: filePath, changed, settings: applied };
}

/** Uncommented `key=value` lines for the given keys, in file order. */
export function readConfEntries(filePath: string, keys: readonly string[]): ConfExcerptLine[] {
  const doc = loadConfFile(filePath);
  const located = keys.flatMap((key) => findEntries(doc, key));
  return located
    .sort((a, b) => a.index - b.index)
    .map((entry) => ({
      lineNumber: entry.index + 1,
      text: `${entry.key}=${entry.value}`,
    }));
}
