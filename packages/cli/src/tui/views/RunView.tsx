import React from 'react';
import { Box, Text, useApp } from 'ink';
import { useEffect } from 'react';
import { Header } from '../components/Header.js';
import { QuestionList } from '../components/QuestionList.js';
import { LabelTally } from '../components/LabelTally.js';
import { ClaimFeed } from '../components/ClaimFeed.js';
import { usePipelineEvents } from '../hooks/usePipelineEvents.js';
import type { RunProps } from '../types.js';

export function RunView(props: RunProps): React.ReactElement {
  const { exit } = useApp();
  const state = usePipelineEvents(props);

  useEffect(() => {
    if (state.done || state.error) {
      // Small delay so the user sees the final state
      const timeout = setTimeout(() => exit(), 300);
      return () => clearTimeout(timeout);
    }
    return undefined;
  }, [state.done, state.error, exit]);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Header docsDir={state.docsDir} lineCount={state.lineCount} questionCount={state.questions.length} />
      <QuestionList questions={state.questions} currentIndex={state.currentIndex} />
      <LabelTally tally={state.tally} />
      <ClaimFeed claims={state.recentClaims} verbose={props.verbose} />

      {state.done && !state.error && (
        <Box marginTop={1}>
          <Text color="green" bold>
            {'\u2713'} Verification complete in {state.totalDurationMs ?? 0}ms
          </Text>
        </Box>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>{'\u2717'} Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
