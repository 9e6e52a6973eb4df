import React from 'react';
import { Box, Text } from 'ink';
import { formatPercent } from '@claimtrace/core';
import type { LabelCounts } from '../types.js';

interface LabelTallyProps {
  tally: LabelCounts;
}

export function LabelTally({ tally }: LabelTallyProps): React.ReactElement {
  const total = tally.supported + tally.notSupported + tally.insufficient;

  return (
    <Box gap={2} marginBottom={1}>
      <Text>Claims: <Text bold>{total}</Text></Text>
      <Text color="green">SUPPORTED {tally.supported} ({formatPercent(tally.supported, total)}%)</Text>
      <Text color="red">NOT_SUPPORTED {tally.notSupported} ({formatPercent(tally.notSupported, total)}%)</Text>
      <Text color="yellow">INSUFFICIENT {tally.insufficient} ({formatPercent(tally.insufficient, total)}%)</Text>
    </Box>
  );
}
