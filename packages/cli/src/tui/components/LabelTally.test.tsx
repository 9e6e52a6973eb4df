import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { LabelTally } from './LabelTally.js';

describe('LabelTally', () => {
  it('shows each label with its count and share', () => {
    const { lastFrame } = render(<LabelTally tally={{ supported: 2, notSupported: 1, insufficient: 0 }} />);
    const output = lastFrame() ?? '';
    expect(output).toContain('SUPPORTED 2 (66.7%)');
    expect(output).toContain('NOT_SUPPORTED 1 (33.3%)');
    expect(output).toContain('INSUFFICIENT 0 (0.0%)');
  });

  it('shows zero shares before any claim is verified', () => {
    const { lastFrame } = render(<LabelTally tally={{ supported: 0, notSupported: 0, insufficient: 0 }} />);
    const output = lastFrame() ?? '';
    expect(output).toContain('SUPPORTED 0 (0.0%)');
    expect(output).toContain('INSUFFICIENT 0 (0.0%)');
  });
});
