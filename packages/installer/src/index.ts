#!/usr/bin/env node

import { AGENT_UNIT } from '@zbx-provision/shared';
import { handleConfCommand } from './cli/conf.js';
import { getServiceStatus } from './cli/service.js';
import { type ConfigOverrides, loadProvisionConfig } from './config.js';
import { errorMessage } from './errors.js';
import { probeTcp } from './network/probe.js';
import { createDefaultDeps, runProvision } from './provision/flow.js';
import { formatReport } from './provision/summary.js';
import { displayIp, resolveHostIdentity } from './system/host.js';
import type { ProvisionOutcome } from './tui/ProvisionApp.js';
import { VERSION } from './version.js';

const args = process.argv.slice(2);
const command = args[0];

function hasFlag(flag: string): boolean {
  return args.includes(flag);
}

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function printUsage(): void {
  console.log('Usage: zbx-provision [command]');
  console.log('');
  console.log('Commands:');
  console.log('  install          Install and configure Zabbix Agent 2 (run as root)');
  console.log('  identity         Print this host\'s hostname and primary IPv4');
  console.log('  probe <host> <port>  Test a TCP connection (exit 0 when reachable)');
  console.log('  conf             Edit key=value configuration files (set, show)');
  console.log('  service status   Show the zabbix-agent2 unit state');
  console.log('  help             Show this help');
  console.log('');
  console.log('Install options:');
  console.log('  --server <addr>          Zabbix server (env ZBX_SERVER)');
  console.log('  --zabbix-version <v>     Repository version, e.g. 7.4 (env ZBX_VERSION)');
  console.log('  --log-dir <dir>          Evidence directory (env LOG_DIR)');
  console.log('  --debian-release <n>     Debian major for the repo package (env ZBX_DEBIAN_RELEASE)');
  console.log('  --timeout <s>            TCP probe timeout in seconds (env ZBX_PROBE_TIMEOUT)');
  console.log('  --headless               Plain log output instead of the TUI');
}

function configOverrides(): ConfigOverrides {
  return {
    server: getArg('--server'),
    zabbixVersion: getArg('--zabbix-version'),
    logDir: getArg('--log-dir'),
    debianRelease: getArg('--debian-release'),
    probeTimeoutSeconds: getArg('--timeout'),
  };
}

async function cmdInstall(): Promise<number> {
  const config = loadProvisionConfig(process.env, configOverrides());
  const headless = hasFlag('--headless') || !process.stdout.isTTY;
  const deps = createDefaultDeps(config, headless);

  if (headless) {
    const report = await runProvision(config, deps);
    for (const line of formatReport(report)) console.log(line);
    return report.success ? 0 : 1;
  }

  let outcome: ProvisionOutcome = {};
  const { render } = await import('ink');
  const { createElement } = await import('react');
  const { ProvisionApp } = await import('./tui/ProvisionApp.js');
  const { waitUntilExit } = render(
    createElement(ProvisionApp, {
      config,
      run: (observer) => runProvision(config, deps, observer),
      onFinish: (result) => {
        outcome = result;
      },
    }),
  );
  await waitUntilExit();

  if (outcome.error !== undefined) throw outcome.error;
  return outcome.report?.success ? 0 : 1;
}

async function cmdIdentity(): Promise<number> {
  const identity = await resolveHostIdentity();
  console.log(`Hostname: ${identity.hostname}`);
  console.log(`IPv4:     ${displayIp(identity)}`);
  return 0;
}

async function cmdProbe(): Promise<number> {
  const host = args[1];
  const port = Number(args[2]);
  if (!host || host.startsWith('--') || !Number.isInteger(port)) {
    console.error('Usage: zbx-provision probe <host> <port> [--timeout <s>]');
    return 1;
  }

  const config = loadProvisionConfig(process.env, { probeTimeoutSeconds: getArg('--timeout') });
  const result = await probeTcp(host, port, config.probeTimeoutSeconds);
  if (result.reachable) {
    console.log(`OK: TCP ${host}:${port} reachable in ${result.durationMs} ms`);
    return 0;
  }
  console.log(`FAIL: TCP ${host}:${port} unreachable: ${result.error ?? 'unknown'}`);
  return 1;
}

function handleServiceCommand(subArgs: string[]): number {
  const sub = subArgs[0];

  switch (sub) {
    case 'status':
      console.log(`${AGENT_UNIT} service: ${getServiceStatus(AGENT_UNIT)}`);
      return 0;
    default:
      console.log('Usage: zbx-provision service status');
      if (sub) {
        console.error(`\nUnknown subcommand: ${sub}`);
        return 1;
      }
      return 0;
  }
}

async function main(): Promise<number> {
  if (command === '--version' || command === '-v' || hasFlag('--version')) {
    console.log(VERSION);
    return 0;
  }

  switch (command) {
    case 'install':
      return cmdInstall();
    case 'identity':
      return cmdIdentity();
    case 'probe':
      return cmdProbe();
    case 'conf':
      return handleConfCommand(args.slice(1));
    case 'service':
      return handleServiceCommand(args.slice(1));
    case undefined:
    case 'help':
    case '--help':
      printUsage();
      return 0;
    default:
      printUsage();
      console.error(`\nUnknown command: ${command}`);
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
