import {
  decisionEmbeddingText,
  entityLabel,
  entityMatches,
  entityText,
  isAnsweredQuestion,
  roadmapEmbeddingText,
  roadmapItemId,
  sameItemName
} from '../../core/entities.js';
import { TestHelpers } from '../setup.js';

describe('Entity accessors', () => {
  test('should pick the primary text of each kind', () => {
    expect(entityText(TestHelpers.chunk('C1'))).toBe('Content of C1');
    expect(entityText(TestHelpers.decision('D1'))).toBe('Statement of D1');
    expect(entityText(TestHelpers.question('Q1'))).toBe('Question Q1?');
    expect(entityText(TestHelpers.gap('G1'))).toBe('Gap G1');
    expect(entityText(TestHelpers.roadmapItem('Search'))).toBe('Search: Description of Search');
    expect(entityText(TestHelpers.roadmapItem('Search', { description: '' }))).toBe('Search');
  });

  test('should label roadmap items and assessments by name', () => {
    expect(entityLabel(TestHelpers.roadmapItem('Search'))).toBe('Search');
    expect(entityLabel(TestHelpers.assessment('A1', { assessmentType: 'competitive' }))).toBe('competitive assessment');
    expect(entityLabel(TestHelpers.chunk('C1'))).toBe('C1');
  });

  test('should tell answered questions from the rest', () => {
    expect(isAnsweredQuestion(TestHelpers.question('Q1', { status: 'answered' }))).toBe(true);
    expect(isAnsweredQuestion(TestHelpers.question('Q2', { status: 'deferred' }))).toBe(false);
  });

  test('should match terms case-insensitively against any field', () => {
    const chunk = TestHelpers.chunk('C1', { lens: 'Security' });

    expect(entityMatches(chunk, 'security')).toBe(true);
    expect(entityMatches(chunk, 'NOTES.MD')).toBe(true);
    expect(entityMatches(chunk, 'billing')).toBe(false);
  });

  test('should build embedding texts', () => {
    expect(roadmapEmbeddingText(TestHelpers.roadmapItem('Search'))).toBe('Search. Description of Search');
    expect(decisionEmbeddingText(TestHelpers.decision('D1'))).toBe('Statement of D1. Rationale of D1');
    expect(decisionEmbeddingText(TestHelpers.decision('D2', { statement: ' ', rationale: '' }))).toBe('');
  });

  test('should derive roadmap item ids from names', () => {
    expect(roadmapItemId('Unified Search API')).toBe('ri_unified_search_api');
    expect(roadmapItemId('Unified  Search')).toBe('ri_unified__search');
    expect(roadmapItemId('x'.repeat(60))).toBe(`ri_${'x'.repeat(50)}`);
  });

  test('should compare item names loosely', () => {
    expect(sameItemName(' Search API ', 'search api')).toBe(true);
    expect(sameItemName('Search', 'Search API')).toBe(false);
  });
});
