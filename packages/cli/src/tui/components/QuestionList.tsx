import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { QuestionState } from '../types.js';

interface QuestionListProps {
  questions: QuestionState[];
  currentIndex: number;
  /** Rows shown at most; the window follows the current question. */
  maxRows?: number;
}

function formatElapsed(ms: number | undefined): string {
  if (ms === undefined) return '';
  return `${ms}ms`;
}

function StatusIcon({ status }: { status: QuestionState['status'] }): React.ReactElement {
  switch (status) {
    case 'done':
      return <Text color="green">{'\u2713'}</Text>;
    case 'running':
      return <Text color="cyan"><Spinner type="dots" /></Text>;
    case 'error':
      return <Text color="red">{'\u2717'}</Text>;
    case 'pending':
    default:
      return <Text dimColor>{'\u25CB'}</Text>;
  }
}

function QuestionRow({ question, isCurrent }: { question: QuestionState; isCurrent: boolean }): React.ReactElement {
  const { labels } = question;
  const pending = question.status === 'pending';

  return (
    <Box gap={1}>
      <StatusIcon status={question.status} />
      <Box width={12}>
        <Text bold={isCurrent}>{question.qid}</Text>
      </Box>
      <Box width={7} justifyContent="flex-end">
        <Text dimColor={pending}>{question.verified}/{question.claimCount}</Text>
      </Box>
      {question.verified > 0 && (
        <Box gap={1}>
          <Text color="green">{labels.supported}S</Text>
          <Text color="red">{labels.notSupported}N</Text>
          <Text color="yellow">{labels.insufficient}I</Text>
        </Box>
      )}
      <Text dimColor>{formatElapsed(question.elapsedMs)}</Text>
    </Box>
  );
}

export function QuestionList({ questions, currentIndex, maxRows = 10 }: QuestionListProps): React.ReactElement {
  const start = Math.max(0, Math.min(currentIndex - Math.floor(maxRows / 2), questions.length - maxRows));
  const visible = questions.slice(start, start + maxRows);
  const hidden = questions.length - visible.length;

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold dimColor>Questions:</Text>
      {visible.map((question, i) => (
        <QuestionRow key={question.qid} question={question} isCurrent={start + i === currentIndex} />
      ))}
      {hidden > 0 && <Text dimColor>  {'\u2026'} {hidden} more</Text>}
    </Box>
  );
}
