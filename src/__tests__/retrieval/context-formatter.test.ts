import { createEmptyResults } from '../../retrieval/authority-retriever.js';
import { formatContextWithAuthority } from '../../retrieval/context-formatter.js';
import { TestHelpers } from '../setup.js';

describe('formatContextWithAuthority', () => {
  test('should render nothing for empty results', () => {
    expect(formatContextWithAuthority(createEmptyResults())).toBe('');
  });

  test('should render sections from highest to lowest authority', () => {
    const results = createEmptyResults();
    results.pending_questions.push({ id: 'Q2', data: TestHelpers.question('Q2', { text: 'Currency?' }), similarity: 0.7 });
    results.chunks.push({
      id: 'C1',
      data: TestHelpers.chunk('C1', { content: 'Uses MySQL' }),
      similarity: 0.7,
      supersededBy: 'D1'
    });
    results.answered_questions.push({
      id: 'Q1',
      data: TestHelpers.question('Q1', { text: 'Which database?', status: 'answered', answeredByDecision: 'D1' }),
      similarity: 0.8
    });
    results.decisions.push({
      id: 'D1',
      data: TestHelpers.decision('D1', { statement: 'Adopt Postgres', rationale: '' }),
      similarity: 0.9
    });

    expect(formatContextWithAuthority(results)).toBe(
      '## RESOLVED DECISIONS (Highest Authority)\n' +
      'These decisions override conflicting content.\n\n' +
      '### D1\n' +
      '**Decision:** Adopt Postgres\n' +
      '**Rationale:** N/A\n\n' +
      '## ANSWERED QUESTIONS\n' +
      '- Which database? (Answered by D1)\n\n' +
      '## SOURCE EXCERPTS\n' +
      '- [engineering] notes.md: Uses MySQL (superseded by D1)\n\n' +
      '## OPEN QUESTIONS\n' +
      '- [high] Currency?\n'
    );
  });

  test('should truncate long fields', () => {
    const results = createEmptyResults();
    results.assessments.push({
      id: 'A1',
      data: TestHelpers.assessment('A1', { summary: 'a'.repeat(250) }),
      similarity: 0.8
    });
    results.roadmap_items.push({
      id: 'ri_billing',
      data: TestHelpers.roadmapItem('Billing', { description: 'b'.repeat(200), horizon: 'next' }),
      similarity: 0.7
    });
    results.gaps.push({ id: 'G1', data: TestHelpers.gap('G1', { description: 'c'.repeat(151) }), similarity: 0.7 });

    expect(formatContextWithAuthority(results).split('\n')).toEqual([
      '## ASSESSMENTS',
      `- architecture: ${'a'.repeat(200)}`,
      '',
      '## ROADMAP ITEMS',
      `- **Billing** (next): ${'b'.repeat(150)}`,
      '',
      '## IDENTIFIED GAPS',
      `- [medium] ${'c'.repeat(150)}`,
      ''
    ]);
  });

  test('should list at most five decisions', () => {
    const results = createEmptyResults();
    for (let i = 1; i <= 7; i++) {
      results.decisions.push({ id: `D${i}`, data: TestHelpers.decision(`D${i}`), similarity: 0.9 });
    }

    const headers = formatContextWithAuthority(results)
      .split('\n')
      .filter(line => line.startsWith('### '));

    expect(headers).toEqual(['### D1', '### D2', '### D3', '### D4', '### D5']);
  });

  test('should mark answered questions without a known decision', () => {
    const results = createEmptyResults();
    results.answered_questions.push({
      id: 'Q1',
      data: TestHelpers.question('Q1', { status: 'answered' }),
      similarity: 0.8
    });

    expect(formatContextWithAuthority(results)).toBe('## ANSWERED QUESTIONS\n- Question Q1? (Answered)\n');
  });
});
