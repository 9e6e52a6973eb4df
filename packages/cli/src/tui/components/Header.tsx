import React from 'react';
import { Box, Text } from 'ink';

interface HeaderProps {
  docsDir: string;
  lineCount?: number;
  questionCount: number;
}

export function Header({ docsDir, lineCount, questionCount }: HeaderProps): React.ReactElement {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text bold color="cyan">claimtrace</Text>
        <Text dimColor> | </Text>
        <Text>Verifying: </Text>
        <Text bold color="green">{questionCount} {questionCount === 1 ? 'question' : 'questions'}</Text>
      </Box>
      <Box gap={2}>
        <Box>
          <Text dimColor>Docs: </Text>
          <Text>{docsDir}</Text>
        </Box>
        <Box>
          <Text dimColor>Lines: </Text>
          <Text>{lineCount === undefined ? 'indexing…' : lineCount}</Text>
        </Box>
      </Box>
    </Box>
  );
}
