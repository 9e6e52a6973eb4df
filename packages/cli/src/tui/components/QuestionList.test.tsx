import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { QuestionList } from './QuestionList.js';
import type { QuestionState } from '../types.js';

function makeQuestion(overrides: Partial<QuestionState> = {}): QuestionState {
  return {
    qid: 'q01',
    status: 'pending',
    claimCount: 2,
    verified: 0,
    labels: { supported: 0, notSupported: 0, insufficient: 0 },
    ...overrides,
  };
}

describe('QuestionList', () => {
  it('shows a pending question with its claim progress', () => {
    const { lastFrame } = render(<QuestionList questions={[makeQuestion()]} currentIndex={0} />);
    const output = lastFrame() ?? '';
    expect(output).toContain('○');
    expect(output).toContain('q01');
    expect(output).toContain('0/2');
    expect(output).not.toContain('0S');
  });

  it('shows a finished question with label counts and elapsed time', () => {
    const question = makeQuestion({
      status: 'done',
      verified: 2,
      labels: { supported: 1, notSupported: 0, insufficient: 1 },
      elapsedMs: 15,
    });
    const { lastFrame } = render(<QuestionList questions={[question]} currentIndex={0} />);
    const output = lastFrame() ?? '';
    expect(output).toContain('✓');
    expect(output).toContain('2/2');
    expect(output).toContain('1S');
    expect(output).toContain('0N');
    expect(output).toContain('1I');
    expect(output).toContain('15ms');
  });

  it('marks a failed question', () => {
    const { lastFrame } = render(
      <QuestionList questions={[makeQuestion({ status: 'error' })]} currentIndex={0} />,
    );
    expect(lastFrame()).toContain('✗');
  });

  it('limits rows and counts the hidden ones', () => {
    const questions = Array.from({ length: 12 }, (_, i) =>
      makeQuestion({ qid: `q${String(i + 1).padStart(2, '0')}` }),
    );
    const { lastFrame } = render(<QuestionList questions={questions} currentIndex={0} />);
    const output = lastFrame() ?? '';
    expect(output).toContain('q10');
    expect(output).not.toContain('q11');
    expect(output).toContain('… 2 more');
  });

  it('scrolls the window to the current question', () => {
    const questions = Array.from({ length: 12 }, (_, i) =>
      makeQuestion({ qid: `q${String(i + 1).padStart(2, '0')}` }),
    );
    const { lastFrame } = render(<QuestionList questions={questions} currentIndex={11} />);
    const output = lastFrame() ?? '';
    expect(output).not.toContain('q02');
    expect(output).toContain('q03');
    expect(output).toContain('q12');
  });
});
