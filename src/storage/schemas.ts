/**
 * Schemas for the persisted graph documents
 */

import { z } from 'zod';
import {
  ASSESSMENT_TYPES,
  DECISION_STATUSES,
  EDGE_TYPES,
  ENTITY_KINDS,
  HORIZONS,
  QUESTION_STATUSES
} from '../core/types.js';
import { JsonObjectSchema } from '../sources/schemas.js';

const ChunkSchema = z.object({
  kind: z.literal('chunk'),
  id: z.string().min(1),
  content: z.string(),
  lens: z.string(),
  sourceName: z.string(),
  sourcePath: z.string(),
  chunkIndex: z.number(),
  tokenCount: z.number()
});

const DecisionSchema = z.object({
  kind: z.literal('decision'),
  id: z.string().min(1),
  statement: z.string(),
  rationale: z.string(),
  implications: z.array(z.string()),
  owner: z.string(),
  status: z.enum(DECISION_STATUSES),
  questionId: z.string().optional(),
  relatedRoadmapItems: z.array(z.string()),
  createdAt: z.string().optional()
});

const QuestionSchema = z.object({
  kind: z.literal('question'),
  id: z.string().min(1),
  text: z.string(),
  audience: z.string(),
  category: z.string(),
  priority: z.string(),
  status: z.enum(QUESTION_STATUSES),
  relatedRoadmapItems: z.array(z.string()),
  answeredByDecision: z.string().optional(),
  createdAt: z.string().optional()
});

const AssessmentSchema = z.object({
  kind: z.literal('assessment'),
  id: z.string().min(1),
  assessmentType: z.enum(ASSESSMENT_TYPES),
  summary: z.string(),
  payload: JsonObjectSchema
});

const RoadmapItemSchema = z.object({
  kind: z.literal('roadmap_item'),
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  horizon: z.enum(HORIZONS),
  dependencies: z.array(z.string())
});

const GapSchema = z.object({
  kind: z.literal('gap'),
  id: z.string().min(1),
  description: z.string(),
  severity: z.string(),
  assessmentType: z.enum(ASSESSMENT_TYPES),
  identifiedBy: z.string()
});

export const EntitySchema = z.discriminatedUnion('kind', [
  ChunkSchema,
  DecisionSchema,
  QuestionSchema,
  AssessmentSchema,
  RoadmapItemSchema,
  GapSchema
]);

export const PersistedGraphSchema = z.object({
  directed: z.boolean().default(true),
  multigraph: z.boolean().default(false),
  graph: JsonObjectSchema.default({}),
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      node_type: z.enum(ENTITY_KINDS),
      data: EntitySchema,
      embedding: z.array(z.number()).nullish()
    })
  ),
  links: z.array(
    z.object({
      source: z.string().min(1),
      target: z.string().min(1),
      edge_type: z.enum(EDGE_TYPES),
      weight: z.number().default(1.0),
      metadata: JsonObjectSchema.nullish().transform(value => value ?? {})
    })
  )
});

/** `{type}_nodes.json`: id → entity record */
export const EntityIndexFileSchema = z.record(EntitySchema);
