import React from 'react';
import { render } from 'ink';
import type { PipelineCompleteEvent } from '@claimtrace/core';
import { App } from './App.js';
import type { RunProps, VerificationPipeline } from './types.js';

export type { RunProps, RunState, QuestionState, ClaimEntry, LabelCounts } from './types.js';
export { runHeadless } from './headless.js';

/**
 * Render the live run view until the pipeline settles.
 * Resolves with the pipeline result, or rejects with its error.
 */
export async function renderRun(props: RunProps & { pipeline: VerificationPipeline }): Promise<PipelineCompleteEvent> {
  const { pipeline } = props;
  const outcome: { result?: PipelineCompleteEvent; failure?: Error } = {};

  pipeline.once('pipeline:complete', event => { outcome.result = event; });
  pipeline.once('pipeline:error', event => { outcome.failure = event.error; });

  const { waitUntilExit } = render(
    React.createElement(App, {
      view: 'run',
      runProps: props,
    }),
  );
  await waitUntilExit();

  if (outcome.failure) throw outcome.failure;
  if (!outcome.result) throw new Error('Run view closed before the pipeline finished');
  return outcome.result;
}
