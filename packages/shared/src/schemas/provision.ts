import { z } from 'zod';
import {
  DEFAULT_LOG_DIR,
  DEFAULT_PROBE_TIMEOUT_SECONDS,
  MAX_PROBE_TIMEOUT_SECONDS,
  DEFAULT_ZABBIX_SERVER,
  DEFAULT_ZABBIX_VERSION,
  StepStatus,
} from '../types/common.js';

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Effective settings for one provisioning run.
 * Built once at startup from flags and environment, then passed explicitly.
 */
export const ProvisionConfig = z.object({
  /** Zabbix server (or proxy) address written to Server/ServerActive */
  server: z.string().trim().min(1).default(DEFAULT_ZABBIX_SERVER),
  /** Repository series, e.g. "7.4" */
  zabbixVersion: z
    .string()
    .regex(/^\d+\.\d+$/, 'expected <major>.<minor>, e.g. 7.4')
    .default(DEFAULT_ZABBIX_VERSION),
  logDir: z.string().min(1).default(DEFAULT_LOG_DIR),
  /** Debian major for the release package; detected from os-release when unset */
  debianRelease: z.coerce.number().int().positive().optional(),
  probeTimeoutSeconds: z.coerce
    .number()
    .positive()
    .max(MAX_PROBE_TIMEOUT_SECONDS)
    .default(DEFAULT_PROBE_TIMEOUT_SECONDS),
  logLevel: LogLevel.default('info'),
});
export type ProvisionConfig = z.infer<typeof ProvisionConfig>;

/** Outcome of a single bounded TCP connection attempt */
export const ProbeResult = z.object({
  reachable: z.boolean(),
  host: z.string(),
  port: z.number().int(),
  durationMs: z.number(),
  /** Failure reason (error code or "timeout"); absent when reachable */
  error: z.string().optional(),
});
export type ProbeResult = z.infer<typeof ProbeResult>;

export const StepRecord = z.object({
  step: z.string(),
  title: z.string(),
  status: StepStatus,
  startedAt: z.string().datetime(),
  durationMs: z.number(),
  detail: z.string().optional(),
  prevHash: z.string(),
});
export type StepRecord = z.infer<typeof StepRecord>;
