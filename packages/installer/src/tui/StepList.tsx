import type { StepStatus } from '@zbx-provision/shared';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';

export type RowState = 'pending' | 'running' | StepStatus;

export interface StepRow {
  id: string;
  title: string;
  state: RowState;
  detail?: string;
}

const MARKS: Record<Exclude<RowState, 'running'>, { mark: string; color: string }> = {
  pending: { mark: '·', color: 'gray' },
  ok: { mark: '✓', color: 'green' },
  warn: { mark: '!', color: 'yellow' },
  failed: { mark: '✗', color: 'red' },
  skipped: { mark: '-', color: 'gray' },
};

function StepLine({ row }: { row: StepRow }): JSX.Element {
  if (row.state === 'running') {
    return (
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text> {row.title}</Text>
      </Box>
    );
  }

  const { mark, color } = MARKS[row.state];
  return (
    <Box>
      <Text color={color}>{mark}</Text>
      <Text color={row.state === 'pending' || row.state === 'skipped' ? 'gray' : undefined}>
        {' '}
        {row.title}
      </Text>
      {row.detail ? <Text color="gray"> ({row.detail})</Text> : null}
    </Box>
  );
}

export function StepList({ rows }: { rows: StepRow[] }): JSX.Element {
  return (
    <Box flexDirection="column">
      {rows.map((row) => (
        <StepLine key={row.id} row={row} />
      ))}
    </Box>
  );
}
