import type { HostIdentity } from '@zbx-provision/shared';
import { Box, Text, useApp } from 'ink';
import { useEffect, useState } from 'react';
import type { ProvisionConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import {
  type ProvisionObserver,
  type ProvisionReport,
  STEPS,
} from '../provision/flow.js';
import type { RunFiles } from '../provision/naming.js';
import { displayIp } from '../system/host.js';
import { type StepRow, StepList } from './StepList.js';

export interface ProvisionOutcome {
  report?: ProvisionReport;
  error?: unknown;
}

interface ProvisionAppProps {
  config: ProvisionConfig;
  run: (observer: ProvisionObserver) => Promise<ProvisionReport>;
  onFinish: (outcome: ProvisionOutcome) => void;
}

const INITIAL_ROWS: StepRow[] = STEPS.map(({ id, title }) => ({ id, title, state: 'pending' }));

export function ProvisionApp({ config, run, onFinish }: ProvisionAppProps): JSX.Element {
  const { exit } = useApp();
  const [rows, setRows] = useState<StepRow[]>(INITIAL_ROWS);
  const [identity, setIdentity] = useState<HostIdentity | null>(null);
  const [files, setFiles] = useState<RunFiles | null>(null);
  const [outcome, setOutcome] = useState<ProvisionOutcome | null>(null);

  useEffect(() => {
    const update = (id: string, patch: Partial<StepRow>) =>
      setRows((prev) => prev.map((row) => (row.id === id ? { ...row, ...patch } : row)));

    run({
      onStart: (id, runFiles) => {
        setIdentity(id);
        setFiles(runFiles);
      },
      onStepStart: (id) => update(id, { state: 'running' }),
      onStepEnd: (record) => update(record.step, { state: record.status, detail: record.detail }),
    })
      .then((report) => setOutcome({ report }))
      .catch((err: unknown) => setOutcome({ error: err }));
  }, [run]);

  useEffect(() => {
    if (!outcome) return;
    onFinish(outcome);
    exit();
  }, [outcome, onFinish, exit]);

  const report = outcome?.report;

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Zabbix Agent 2 Installer
        </Text>
        {identity && (
          <Text color="gray">
            {' '}
            - {identity.hostname} ({displayIp(identity)}) {'->'} {config.server}
          </Text>
        )}
      </Box>

      <StepList rows={rows} />

      {outcome?.error !== undefined && (
        <Box marginTop={1}>
          <Text color="red">Error: {errorMessage(outcome.error)}</Text>
        </Box>
      )}

      {report && (
        <Box marginTop={1} flexDirection="column">
          <Text bold color={report.success ? 'green' : 'red'}>
            {report.success
              ? 'Install finished.'
              : `Install failed at ${report.failure?.step ?? 'unknown step'}.`}
          </Text>
          {report.failure && <Text color="red">{report.failure.message}</Text>}
        </Box>
      )}

      {files && (
        <Box marginTop={1} flexDirection="column">
          <Text color="gray">Log:        {files.logFile}</Text>
          <Text color="gray">Transcript: {files.transcriptFile}</Text>
        </Box>
      )}
    </Box>
  );
}
