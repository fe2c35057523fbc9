/**
 * Markdown brief of retrieval results for synthesis prompts
 */

import type { AuthorityCategory } from '../core/authority.js';
import type { AuthorityResults } from './types.js';

/** Entries rendered per category */
export const BRIEF_LIMITS: Record<AuthorityCategory, number> = {
  decisions: 5,
  answered_questions: 5,
  assessments: 5,
  roadmap_items: 10,
  gaps: 10,
  chunks: 10,
  pending_questions: 10
};

const orNA = (value: string) => (value.trim().length > 0 ? value : 'N/A');

/**
 * Flatten results into sections ordered from highest to lowest authority.
 * Empty categories are omitted.
 */
export function formatContextWithAuthority(results: AuthorityResults): string {
  const sections: string[] = [];

  if (results.decisions.length > 0) {
    sections.push('## RESOLVED DECISIONS (Highest Authority)');
    sections.push('These decisions override conflicting content.\n');
    for (const { data } of results.decisions.slice(0, BRIEF_LIMITS.decisions)) {
      sections.push(`### ${data.id}`);
      sections.push(`**Decision:** ${orNA(data.statement)}`);
      sections.push(`**Rationale:** ${orNA(data.rationale)}\n`);
    }
  }

  if (results.answered_questions.length > 0) {
    sections.push('## ANSWERED QUESTIONS');
    for (const { data } of results.answered_questions.slice(0, BRIEF_LIMITS.answered_questions)) {
      const resolution = data.answeredByDecision ? ` (Answered by ${data.answeredByDecision})` : ' (Answered)';
      sections.push(`- ${orNA(data.text)}${resolution}\n`);
    }
  }

  if (results.assessments.length > 0) {
    sections.push('## ASSESSMENTS');
    for (const { data } of results.assessments.slice(0, BRIEF_LIMITS.assessments)) {
      sections.push(`- ${data.assessmentType}: ${orNA(data.summary.slice(0, 200))}\n`);
    }
  }

  if (results.roadmap_items.length > 0) {
    sections.push('## ROADMAP ITEMS');
    for (const { data } of results.roadmap_items.slice(0, BRIEF_LIMITS.roadmap_items)) {
      sections.push(`- **${data.name}** (${data.horizon}): ${orNA(data.description.slice(0, 150))}\n`);
    }
  }

  if (results.gaps.length > 0) {
    sections.push('## IDENTIFIED GAPS');
    for (const { data } of results.gaps.slice(0, BRIEF_LIMITS.gaps)) {
      sections.push(`- [${data.severity}] ${orNA(data.description.slice(0, 150))}\n`);
    }
  }

  if (results.chunks.length > 0) {
    sections.push('## SOURCE EXCERPTS');
    for (const { data, supersededBy } of results.chunks.slice(0, BRIEF_LIMITS.chunks)) {
      const note = supersededBy ? ` (superseded by ${supersededBy})` : '';
      sections.push(`- [${data.lens}] ${orNA(data.sourceName)}: ${data.content.slice(0, 300)}${note}\n`);
    }
  }

  if (results.pending_questions.length > 0) {
    sections.push('## OPEN QUESTIONS');
    for (const { data } of results.pending_questions.slice(0, BRIEF_LIMITS.pending_questions)) {
      sections.push(`- [${data.priority}] ${orNA(data.text)}\n`);
    }
  }

  return sections.join('\n');
}
