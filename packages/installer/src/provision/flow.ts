import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ACTIVE_CHECK_PORT,
  AGENT_BINARY,
  AGENT_CONF_PATH,
  AGENT_PACKAGE,
  AGENT_UNIT,
  DEFAULT_DEBIAN_RELEASE,
  type HostIdentity,
  PASSIVE_CHECK_PORT,
  PREREQUISITE_PACKAGES,
  type ProbeResult,
  type StepRecord,
} from '@zbx-provision/shared';
import { type ServiceController, createServiceController } from '../cli/service.js';
import { applyConfSettings, backupConfFile, readConfEntries } from '../conf/file.js';
import type { ProvisionConfig } from '../config.js';
import { ProvisionError, errorMessage } from '../errors.js';
import { type Logger, createLogger } from '../logger.js';
import { type ListenerQuery, createListenerQuery, formatListener } from '../network/listeners.js';
import { probeTcp } from '../network/probe.js';
import { requireRoot } from '../runtime/privilege.js';
import { CommandFailedError, type ExecFn, defaultExec } from '../system/exec.js';
import {
  type HostSources,
  createHostSources,
  displayIp,
  resolveHostIdentity,
} from '../system/host.js';
import { type OsRelease, debianMajor, describeOs, readOsRelease } from '../system/os-release.js';
import { AptPackageManager, type PackageManager } from '../system/packages.js';
import {
  type FetchFn,
  buildReleasePackageUrl,
  downloadReleasePackage,
} from '../system/repository.js';
import { StepJournal } from './journal.js';
import { type RunFiles, formatClock, formatRunTimestamp, runFiles } from './naming.js';
import { Transcript } from './transcript.js';

export type StepId =
  | 'identity'
  | 'os-release'
  | 'prerequisites'
  | 'repository'
  | 'agent-package'
  | 'configure'
  | 'service'
  | 'listeners'
  | 'connectivity'
  | 'versions'
  | 'cleanup';

export const STEPS: readonly { id: StepId; title: string }[] = [
  { id: 'identity', title: 'Host identity' },
  { id: 'os-release', title: 'OS evidence (/etc/os-release)' },
  { id: 'prerequisites', title: 'Prerequisites (ca-certificates, gnupg, lsb-release, curl)' },
  { id: 'repository', title: 'Zabbix repository (zabbix-release)' },
  { id: 'agent-package', title: 'Install zabbix-agent2' },
  { id: 'configure', title: 'Configure Server/ServerActive/Hostname' },
  { id: 'service', title: 'Enable and start service' },
  { id: 'listeners', title: `Local port ${PASSIVE_CHECK_PORT}/tcp` },
  { id: 'connectivity', title: `Zabbix server ${ACTIVE_CHECK_PORT}/tcp (active checks)` },
  { id: 'versions', title: 'Package and agent versions' },
  { id: 'cleanup', title: 'Remove temporary files' },
];

/** Steps whose failure ends the run; every other step degrades to a warning */
const FATAL_STEPS: ReadonlySet<StepId> = new Set([
  'prerequisites',
  'repository',
  'agent-package',
  'configure',
  'service',
]);

export const CONF_EVIDENCE_KEYS = ['Server', 'ServerActive', 'Hostname'] as const;

export interface StepOutcome {
  status: 'ok' | 'warn';
  detail?: string;
}

export interface ProvisionDeps {
  packages: PackageManager;
  services: ServiceController;
  listeners: ListenerQuery;
  hostSources: HostSources;
  fetchFn: FetchFn;
  exec: ExecFn;
  probe: (host: string, port: number, timeoutSeconds: number) => Promise<ProbeResult>;
  readOsRelease: () => OsRelease | undefined;
  requireRoot: () => void;
  createLogger: (logFile: string) => Logger;
  confPath: string;
  /** Parent of the per-run work directory */
  tmpDir: string;
  clock: () => Date;
}

export interface ProvisionObserver {
  onStart?(identity: HostIdentity, files: RunFiles): void;
  onStepStart?(id: StepId, title: string): void;
  onStepEnd?(record: StepRecord): void;
}

export interface ProvisionReport {
  success: boolean;
  identity: HostIdentity;
  files: RunFiles;
  steps: StepRecord[];
  backupPath?: string;
  activeCheck?: ProbeResult;
  failure?: { step: StepId; message: string };
}

export function createDefaultDeps(config: ProvisionConfig, headless: boolean): ProvisionDeps {
  return {
    packages: new AptPackageManager(defaultExec),
    services: createServiceController(),
    listeners: createListenerQuery(),
    hostSources: createHostSources(),
    fetchFn: fetch,
    exec: defaultExec,
    probe: probeTcp,
    readOsRelease: () => readOsRelease(),
    requireRoot: () => requireRoot(),
    createLogger: (file) => createLogger({ level: config.logLevel, file, console: headless }),
    confPath: AGENT_CONF_PATH,
    tmpDir: os.tmpdir(),
    clock: () => new Date(),
  };
}

function lastLines(text: string, count: number): string {
  return text.trimEnd().split('\n').slice(-count).join('\n');
}

/**
 * Install and configure Zabbix Agent 2 on this host, one step at a time.
 *
 * Root and hostname checks throw before any file is written. After that the
 * run always returns a report: a failing fatal step marks the remaining
 * steps skipped (cleanup still runs) and sets `success: false`.
 */
export async function runProvision(
  config: ProvisionConfig,
  deps: ProvisionDeps,
  observer: ProvisionObserver = {},
): Promise<ProvisionReport> {
  deps.requireRoot();

  const identity = await resolveHostIdentity(deps.hostSources);
  const timestamp = formatRunTimestamp(deps.clock());
  const files = runFiles(config.logDir, identity, timestamp);

  fs.mkdirSync(config.logDir, { recursive: true });
  const logger = deps.createLogger(files.logFile);
  const transcript = new Transcript(files.transcriptFile, deps.clock);
  const journal = new StepJournal();
  // Created last so a setup failure leaves nothing behind in tmp
  const workDir = fs.mkdtempSync(path.join(deps.tmpDir, 'zbx-provision-'));

  observer.onStart?.(identity, files);
  logger.info(
    {
      host: identity.hostname,
      ip: displayIp(identity),
      server: config.server,
      zabbixVersion: config.zabbixVersion,
      logFile: files.logFile,
    },
    'Zabbix Agent 2 install started',
  );
  transcript.line('==== ZABBIX AGENT 2 INSTALL - START ====');
  transcript.line(`Host: ${identity.hostname}`);
  transcript.line(`IP:   ${displayIp(identity)}`);
  transcript.line(`Date: ${formatClock(deps.clock())}`);
  transcript.line(`Zabbix Server: ${config.server}`);
  transcript.line(`Zabbix Repo Version: ${config.zabbixVersion}`);
  transcript.line(`Log: ${files.logFile}`);

  const report: ProvisionReport = { success: true, identity, files, steps: [] };
  let release: OsRelease | undefined;

  const handlers: Record<StepId, (log: Logger) => Promise<StepOutcome>> = {
    identity: async () => {
      if (identity.primaryIpv4) {
        return { status: 'ok', detail: `${identity.hostname} (${identity.primaryIpv4})` };
      }
      return { status: 'warn', detail: `${identity.hostname} (no IPv4 detected)` };
    },

    'os-release': async (log) => {
      release = deps.readOsRelease();
      if (!release) {
        log.warn('/etc/os-release not found');
        return { status: 'warn', detail: '/etc/os-release not found' };
      }
      transcript.section('/etc/os-release', release.raw);
      return { status: 'ok', detail: describeOs(release) };
    },

    prerequisites: async (log) => {
      transcript.section('apt-get update', await deps.packages.update());
      log.info({ packages: PREREQUISITE_PACKAGES }, 'Installing prerequisites');
      transcript.section(
        `apt-get install ${PREREQUISITE_PACKAGES.join(' ')}`,
        await deps.packages.install(PREREQUISITE_PACKAGES),
      );
      return { status: 'ok' };
    },

    repository: async (log) => {
      const debianRelease =
        config.debianRelease ?? (release && debianMajor(release)) ?? DEFAULT_DEBIAN_RELEASE;
      const url = buildReleasePackageUrl(config.zabbixVersion, debianRelease);
      log.info({ url }, 'Downloading release package');

      const downloaded = await downloadReleasePackage(
        url,
        path.join(workDir, 'zabbix-release.deb'),
        deps.fetchFn,
      );
      log.info(
        { path: downloaded.path, bytes: downloaded.bytes, sha256: downloaded.sha256 },
        'Downloaded release package',
      );
      transcript.section('zabbix-release download (sha256)', `${downloaded.sha256}  ${url}\n`);

      transcript.section(
        'dpkg -i zabbix-release.deb',
        await deps.packages.installLocal(downloaded.path),
      );
      transcript.section('apt-get update', await deps.packages.update());
      return { status: 'ok', detail: `sha256 ${downloaded.sha256.slice(0, 16)}…` };
    },

    'agent-package': async () => {
      transcript.section(
        `apt-get install ${AGENT_PACKAGE}`,
        await deps.packages.install([AGENT_PACKAGE]),
      );
      return { status: 'ok' };
    },

    configure: async (log) => {
      if (!fs.existsSync(deps.confPath)) {
        throw new ProvisionError(
          'E_CONF_NOT_FOUND',
          `${deps.confPath} not found after installing ${AGENT_PACKAGE}`,
        );
      }
      report.backupPath = backupConfFile(deps.confPath, timestamp);
      log.info({ backup: report.backupPath }, 'Configuration backed up');

      const applied = applyConfSettings(deps.confPath, [
        { key: 'Server', value: config.server },
        { key: 'ServerActive', value: config.server },
        { key: 'Hostname', value: identity.hostname },
      ]);
      for (const setting of applied.settings) {
        const { key, value, action, lineNumbers } = setting;
        log.info({ key, value, action, lines: lineNumbers }, 'Configuration entry set');
      }

      const excerpt = readConfEntries(deps.confPath, CONF_EVIDENCE_KEYS);
      transcript.section(
        `${deps.confPath} (Server/ServerActive/Hostname)`,
        excerpt.map((l) => `${l.lineNumber}:${l.text}`).join('\n'),
      );
      return {
        status: 'ok',
        detail: applied.changed
          ? `backup ${path.basename(report.backupPath)}`
          : 'already configured',
      };
    },

    service: async (log) => {
      const result = deps.services.enableNow(AGENT_UNIT);
      if (!result.success) {
        throw new ProvisionError('E_SERVICE_FAILED', result.message);
      }
      transcript.section(`systemctl status ${AGENT_UNIT}`, deps.services.statusText(AGENT_UNIT));
      const state = deps.services.getStatus(AGENT_UNIT);
      if (state !== 'active') {
        log.warn({ unit: AGENT_UNIT, state }, 'Service is not active after start');
        return { status: 'warn', detail: state };
      }
      return { status: 'ok', detail: state };
    },

    listeners: async (log) => {
      try {
        const found = await deps.listeners.listListeners(PASSIVE_CHECK_PORT);
        transcript.section(
          `Listeners on ${PASSIVE_CHECK_PORT}/tcp`,
          found.map(formatListener).join('\n'),
        );
        if (found.length === 0) {
          log.warn({ port: PASSIVE_CHECK_PORT }, 'Nothing is listening on the agent port');
          return { status: 'warn', detail: 'no listener' };
        }
        return { status: 'ok', detail: found.map(formatListener).join(', ') };
      } catch (err: unknown) {
        log.warn({ err: errorMessage(err) }, 'Could not list listening sockets');
        return { status: 'warn', detail: errorMessage(err) };
      }
    },

    connectivity: async (log) => {
      log.info('Active checks use TCP/10051 (agent -> server)');
      const result = await deps.probe(
        config.server,
        ACTIVE_CHECK_PORT,
        config.probeTimeoutSeconds,
      );
      report.activeCheck = result;
      const target = `${config.server}:${ACTIVE_CHECK_PORT}`;
      if (result.reachable) {
        transcript.line(`OK: TCP ${target} (active) reachable in ${result.durationMs} ms`);
      } else {
        log.warn(
          { target, error: result.error },
          'Active check port unreachable; check route/firewall',
        );
        transcript.line(`WARN: TCP ${target} (active) unreachable: ${result.error ?? 'unknown'}`);
      }
      log.info('Passive checks use TCP/10050 (server -> agent); verify from the server side');
      transcript.line(
        `Passive checks use TCP/${PASSIVE_CHECK_PORT} (server -> agent): ` +
          'verify from the server (zabbix_get or a passive item).',
      );
      return result.reachable
        ? { status: 'ok', detail: `${target} reachable` }
        : { status: 'warn', detail: `${target} ${result.error ?? 'unreachable'}` };
    },

    versions: async (log) => {
      const problems: string[] = [];
      try {
        const installed = await deps.packages.listInstalled(/zabbix-agent2|zabbix-release/);
        transcript.section(
          'Installed packages',
          installed.map((p) => `${p.name} ${p.version} (${p.status})`).join('\n'),
        );
      } catch (err: unknown) {
        problems.push(errorMessage(err));
      }
      let agentVersion: string | undefined;
      try {
        const output = await deps.exec(AGENT_BINARY, ['-V']);
        transcript.section(`${AGENT_BINARY} -V`, output);
        agentVersion = output.split('\n')[0]?.trim();
      } catch (err: unknown) {
        problems.push(errorMessage(err));
      }
      if (problems.length > 0) {
        log.warn({ problems }, 'Version evidence incomplete');
        return { status: 'warn', detail: problems.join('; ') };
      }
      return agentVersion ? { status: 'ok', detail: agentVersion } : { status: 'ok' };
    },

    cleanup: async () => {
      fs.rmSync(workDir, { recursive: true, force: true });
      return { status: 'ok' };
    },
  };

  for (const { id, title } of STEPS) {
    const startedAt = deps.clock();
    const start = Date.now();
    const stepLog = logger.child({ step: id });

    if (report.failure && id !== 'cleanup') {
      const skipped = record(journal, report, {
        step: id,
        title,
        status: 'skipped',
        startedAt: startedAt.toISOString(),
        durationMs: 0,
      });
      stepLog.info({ record: skipped }, 'Step finished');
      observer.onStepEnd?.(skipped);
      continue;
    }

    observer.onStepStart?.(id, title);
    transcript.line(`STEP ${id} - ${title}`);
    stepLog.info(title);

    let entry: Omit<StepRecord, 'prevHash'>;
    try {
      const outcome = await handlers[id](stepLog);
      entry = {
        step: id,
        title,
        status: outcome.status,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - start,
        ...(outcome.detail === undefined ? {} : { detail: outcome.detail }),
      };
    } catch (err: unknown) {
      const message = errorMessage(err);
      const fatal = FATAL_STEPS.has(id);
      stepLog.error({ err: message, fatal }, 'Step failed');
      transcript.line(`ERROR: ${message}`);
      if (err instanceof CommandFailedError && err.stderr) {
        transcript.section('stderr (last lines)', lastLines(err.stderr, 20));
      }
      if (fatal) report.failure = { step: id, message };
      entry = {
        step: id,
        title,
        status: fatal ? 'failed' : 'warn',
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - start,
        detail: message,
      };
    }
    const stored = record(journal, report, entry);
    stepLog.info({ record: stored }, 'Step finished');
    transcript.line(`RESULT ${id} ${stored.status} prevHash=${stored.prevHash || '-'}`);
    observer.onStepEnd?.(stored);
  }

  const journalHead = journal.headHash();
  logger.info({ steps: report.steps.length, journalHead }, 'Step journal closed');
  transcript.line(`JOURNAL: ${report.steps.length} steps, head ${journalHead}`);

  report.success = report.failure === undefined;
  if (report.success) {
    logger.info({ logFile: files.logFile }, 'Zabbix Agent 2 install finished');
    transcript.line('==== ZABBIX AGENT 2 INSTALL - END (SUCCESS) ====');
  } else {
    logger.error({ failure: report.failure }, 'Zabbix Agent 2 install failed');
    transcript.line('==== ZABBIX AGENT 2 INSTALL - END (FAILED) ====');
  }
  transcript.line(`FINAL LOG: ${files.logFile}`);
  return report;
}

function record(
  journal: StepJournal,
  report: ProvisionReport,
  entry: Omit<StepRecord, 'prevHash'>,
): StepRecord {
  const stored = journal.record(entry);
  report.steps.push(stored);
  return stored;
}
