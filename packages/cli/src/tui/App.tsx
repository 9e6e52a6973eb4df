import React from 'react';
import { RunView } from './views/RunView.js';
import type { RunProps } from './types.js';

interface AppProps {
  view: 'run';
  runProps: RunProps;
}

export function App({ view, runProps }: AppProps): React.ReactElement {
  switch (view) {
    case 'run':
      return <RunView {...runProps} />;
  }
}
