import { describe, it, expect } from 'vitest';
import { formatPacksMarkdown } from './markdown.js';
import type { Pack } from '../verification/types.js';

function makePack(overrides: Partial<Pack> = {}): Pack {
  return {
    qid: 'q1',
    answer: 'Refunds take 7 days',
    claims: [
      {
        claim: 'Refunds take 7 days',
        label: 'SUPPORTED',
        evidence: [{ docId: 'policy', location: 'L1', snippet: 'Refunds take 7 days.' }],
      },
      { claim: 'Use *bold* | pipes', label: 'INSUFFICIENT', evidence: [] },
    ],
    retrievalLog: {
      topK: 10,
      candidates: [{ docId: 'policy', score: 5.5, location: 'L1' }],
    },
    ...overrides,
  };
}

describe('formatPacksMarkdown', () => {
  it('renders a summary table for an empty run', () => {
    expect(formatPacksMarkdown({ packs: [] })).toBe([
      '# Verification Report',
      '',
      '## Summary',
      '',
      '| Metric | Value |',
      '|--------|-------|',
      '| Questions | 0 |',
      '| Claims | 0 |',
      '| Supported | 0 (0.0%) |',
      '| Not supported | 0 (0.0%) |',
      '| Insufficient | 0 (0.0%) |',
      '| Claims with evidence | 0/0 |',
      '',
    ].join('\n'));
  });

  it('renders each pack with answer, claims, log and footnotes', () => {
    const output = formatPacksMarkdown({ packs: [makePack()], title: 'Refund Audit' });
    const sections = output.split('\n## q1\n');

    expect(sections[0].startsWith('# Refund Audit\n')).toBe(true);
    expect(sections[0]).toContain('| Supported | 1 (50.0%) |');
    expect(sections[0]).toContain('| Claims with evidence | 1/2 |');
    expect(sections[1]).toBe([
      '',
      '**Answer:** Refunds take 7 days',
      '',
      '- [SUPPORTED] Refunds take 7 days[^q1-1]',
      '- [INSUFFICIENT] Use \\*bold\\* \\| pipes',
      '',
      '**Retrieval log** (top 10)',
      '',
      '| Document | Line | Score |',
      '|----------|------|-------|',
      '| policy | L1 | 5.50 |',
      '',
      '[^q1-1]: policy:L1 — Refunds take 7 days.',
      '',
    ].join('\n'));
  });

  it('omits the retrieval log when asked', () => {
    const output = formatPacksMarkdown({ packs: [makePack()], includeRetrievalLog: false });
    expect(output).not.toContain('**Retrieval log**');
  });

  it('marks packs without claims', () => {
    const output = formatPacksMarkdown({
      packs: [makePack({ claims: [], retrievalLog: { topK: 10, candidates: [] } })],
    });
    expect(output.split('\n')).toContain('_No claims._');
  });
});
