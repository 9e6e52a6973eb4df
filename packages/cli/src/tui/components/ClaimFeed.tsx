import React from 'react';
import { Box, Text } from 'ink';
import type { VerdictLabel } from '@claimtrace/core';
import type { ClaimEntry } from '../types.js';

interface ClaimFeedProps {
  claims: ClaimEntry[];
  verbose?: boolean;
  maxWidth?: number;
}

function labelColor(label: VerdictLabel): string {
  switch (label) {
    case 'SUPPORTED': return 'green';
    case 'NOT_SUPPORTED': return 'red';
    case 'INSUFFICIENT': return 'yellow';
  }
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

export function ClaimFeed({ claims, verbose = false, maxWidth = 60 }: ClaimFeedProps): React.ReactElement | null {
  if (claims.length === 0) return null;

  return (
    <Box flexDirection="column">
      <Text bold dimColor>Latest claims:</Text>
      {claims.map((entry, i) => (
        <Box key={`${entry.qid}-${i}`} gap={1}>
          <Text color={labelColor(entry.label)}>[{entry.label}]</Text>
          <Text dimColor>{entry.qid}</Text>
          <Text>{truncate(entry.claim, maxWidth)}</Text>
          {verbose && <Text dimColor>({entry.rule}{entry.citation ? ` @ ${entry.citation}` : ''})</Text>}
        </Box>
      ))}
    </Box>
  );
}
