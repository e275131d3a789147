import { z } from 'zod';

export const StepStatus = z.enum(['ok', 'warn', 'failed', 'skipped']);
export type StepStatus = z.infer<typeof StepStatus>;

/** Zabbix server address used when neither ZBX_SERVER nor --server is given */
export const DEFAULT_ZABBIX_SERVER = '172.20.7.58';

/** Vendor repository series, e.g. "7.4" */
export const DEFAULT_ZABBIX_VERSION = '7.4';

export const DEFAULT_LOG_DIR = '/var/log/zbx-provision';

/** Debian major assumed when /etc/os-release gives none */
export const DEFAULT_DEBIAN_RELEASE = 13;

/** Reachability probe timeout in seconds */
export const DEFAULT_PROBE_TIMEOUT_SECONDS = 3;
/** Longest delay a Node timer accepts, in whole seconds */
export const MAX_PROBE_TIMEOUT_SECONDS = 2_147_483;

/** Agent listens here; the server connects in (passive checks) */
export const PASSIVE_CHECK_PORT = 10050;

/** Server listens here; the agent connects out (active checks) */
export const ACTIVE_CHECK_PORT = 10051;

/** Placeholder for an undetected primary IPv4 */
export const NO_IP_SENTINEL = 'NOIP';

export const AGENT_PACKAGE = 'zabbix-agent2';
export const AGENT_UNIT = 'zabbix-agent2';
export const AGENT_BINARY = 'zabbix_agent2';
export const AGENT_CONF_PATH = '/etc/zabbix/zabbix_agent2.conf';

export const PREREQUISITE_PACKAGES = ['ca-certificates', 'gnupg', 'lsb-release', 'curl'] as const;
