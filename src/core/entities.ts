/**
 * Accessor functions over the entity union
 *
 * Callers never branch on ad-hoc payload shapes; anything that needs a text
 * view of an entity goes through these.
 */

import type {
  DecisionEntity,
  KnowledgeEntity,
  QuestionEntity,
  RoadmapItemEntity
} from './types.js';

/**
 * Primary human-readable text of an entity
 */
export function entityText(entity: KnowledgeEntity): string {
  switch (entity.kind) {
    case 'chunk':
      return entity.content;
    case 'decision':
      return entity.statement;
    case 'question':
      return entity.text;
    case 'assessment':
      return entity.summary;
    case 'roadmap_item':
      return entity.description ? `${entity.name}: ${entity.description}` : entity.name;
    case 'gap':
      return entity.description;
  }
}

/**
 * Short display label: item name, assessment type, or else the id
 */
export function entityLabel(entity: KnowledgeEntity): string {
  switch (entity.kind) {
    case 'roadmap_item':
      return entity.name;
    case 'assessment':
      return `${entity.assessmentType} assessment`;
    default:
      return entity.id;
  }
}

/**
 * Serialized form used for keyword matching and topic filtering
 */
export function serializeEntity(entity: KnowledgeEntity): string {
  return JSON.stringify(entity);
}

/**
 * Case-insensitive containment test against the serialized entity
 */
export function entityMatches(entity: KnowledgeEntity, term: string): boolean {
  return serializeEntity(entity).toLowerCase().includes(term.toLowerCase());
}

/** Answered questions outrank the rest of the question store */
export function isAnsweredQuestion(question: QuestionEntity): boolean {
  return question.status === 'answered';
}

/** Text embedded for a roadmap item */
export function roadmapEmbeddingText(item: RoadmapItemEntity): string {
  return `${item.name}. ${item.description}`;
}

/**
 * Text embedded for a decision; empty when the decision carries no text,
 * in which case it gets no embedding.
 */
export function decisionEmbeddingText(decision: DecisionEntity): string {
  if (!decision.statement.trim() && !decision.rationale.trim()) {
    return '';
  }
  return `${decision.statement}. ${decision.rationale}`;
}

/**
 * Roadmap item id derived from its name
 */
export function roadmapItemId(name: string): string {
  return `ri_${name.toLowerCase().replace(/ /g, '_').slice(0, 50)}`;
}

/**
 * Name comparison used when linking questions and decisions to roadmap items
 */
export function sameItemName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
