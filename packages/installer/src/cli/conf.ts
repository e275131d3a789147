import { findEntries, getValue } from '../conf/document.js';
import {
  type ConfSetting,
  applyConfSettings,
  backupConfFile,
  loadConfFile,
  readConfEntries,
} from '../conf/file.js';
import { ProvisionError, errorMessage } from '../errors.js';
import { formatRunTimestamp } from '../provision/naming.js';

export interface ConfCommandDeps {
  log: (msg: string) => void;
  error: (msg: string) => void;
  clock: () => Date;
}

function createDefaultDeps(): ConfCommandDeps {
  return {
    log: console.log,
    error: console.error,
    clock: () => new Date(),
  };
}

/** Split `KEY=VALUE` at the first `=`; the value may be empty or contain `=`. */
export function parseAssignment(arg: string): ConfSetting {
  const eq = arg.indexOf('=');
  if (eq <= 0) {
    throw new ProvisionError('E_CONF_INVALID_ENTRY', `Expected KEY=VALUE, got "${arg}"`);
  }
  return { key: arg.slice(0, eq), value: arg.slice(eq + 1) };
}

export function cmdConfSet(
  filePath: string,
  assignments: string[],
  options: { backup: boolean },
  deps?: ConfCommandDeps,
): boolean {
  const { log, error, clock } = deps ?? createDefaultDeps();

  if (assignments.length === 0) {
    error('Error: at least one KEY=VALUE is required');
    return false;
  }

  try {
    const settings = assignments.map(parseAssignment);
    const backupPath = options.backup
      ? backupConfFile(filePath, formatRunTimestamp(clock()))
      : undefined;
    const result = applyConfSettings(filePath, settings);

    for (const s of result.settings) {
      const where = s.lineNumbers.length === 1 ? 'line' : 'lines';
      log(`  ${s.key}=${s.value} (${s.action}, ${where} ${s.lineNumbers.join(', ')})`);
    }
    log(result.changed ? `Updated ${filePath}` : `${filePath} already up to date`);
    if (backupPath) log(`Backup: ${backupPath}`);
    return true;
  } catch (err: unknown) {
    error(`Error: ${errorMessage(err)}`);
    return false;
  }
}

export function cmdConfShow(filePath: string, keys: string[], deps?: ConfCommandDeps): boolean {
  const { log, error } = deps ?? createDefaultDeps();

  if (keys.length === 0) {
    error('Error: at least one KEY is required');
    return false;
  }

  try {
    for (const line of readConfEntries(filePath, keys)) {
      log(`${line.lineNumber}:${line.text}`);
    }
    const doc = loadConfFile(filePath);
    for (const key of keys) {
      if (getValue(doc, key) !== undefined) continue;
      const commented = findEntries(doc, key, { includeCommented: true }).map((e) => e.index + 1);
      log(
        commented.length > 0
          ? `# ${key} is not set (commented out at line ${commented.join(', ')})`
          : `# ${key} is not set`,
      );
    }
    return true;
  } catch (err: unknown) {
    error(`Error: ${errorMessage(err)}`);
    return false;
  }
}

function printConfUsage(log: (msg: string) => void): void {
  log('Usage: zbx-provision conf <command>');
  log('');
  log('Commands:');
  log('  set <file> KEY=VALUE...  Set entries in place (commented ones too), else append');
  log('  show <file> KEY...       Print entries with line numbers; note commented-out ones');
  log('');
  log('Options:');
  log('  --no-backup              Do not write <file>.bak.<timestamp> before editing');
}

/** `conf` subcommand; returns the process exit code. */
export function handleConfCommand(subArgs: string[], deps?: ConfCommandDeps): number {
  const resolved = deps ?? createDefaultDeps();
  const [sub, filePath, ...rest] = subArgs;
  const positional = rest.filter((a) => a !== '--no-backup');

  switch (sub) {
    case 'set':
      if (!filePath) break;
      return cmdConfSet(filePath, positional, { backup: !rest.includes('--no-backup') }, resolved)
        ? 0
        : 1;
    case 'show':
      if (!filePath) break;
      return cmdConfShow(filePath, positional, resolved) ? 0 : 1;
    default:
      printConfUsage(resolved.log);
      if (sub) {
        resolved.error(`\nUnknown subcommand: ${sub}`);
        return 1;
      }
      return 0;
  }

  printConfUsage(resolved.log);
  resolved.error('\nError: <file> is required');
  return 1;
}
