// Types
export {
  StepStatus,
  DEFAULT_ZABBIX_SERVER,
  DEFAULT_ZABBIX_VERSION,
  DEFAULT_LOG_DIR,
  DEFAULT_DEBIAN_RELEASE,
  DEFAULT_PROBE_TIMEOUT_SECONDS,
  MAX_PROBE_TIMEOUT_SECONDS,
  PASSIVE_CHECK_PORT,
  ACTIVE_CHECK_PORT,
  NO_IP_SENTINEL,
  AGENT_PACKAGE,
  AGENT_UNIT,
  AGENT_BINARY,
  AGENT_CONF_PATH,
  PREREQUISITE_PACKAGES,
} from './types/common.js';
export { HostIdentity } from './types/host.js';

// Schemas: provisioning
export {
  LogLevel,
  ProvisionConfig,
  ProbeResult,
  StepRecord,
} from './schemas/provision.js';
