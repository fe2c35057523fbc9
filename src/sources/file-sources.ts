/**
 * File-backed artifact stores
 *
 * Reads the files the collaborators write: roadmap markdown, question and
 * decision stores, assessment outputs and the vector-store chunk export.
 * A missing file means the store is empty.
 */

import { promises as fs } from 'fs';
import type { z } from 'zod';
import type { KnowledgeGraphConfig } from '../config/config.js';
import type { DecisionEntity, JsonObject, QuestionEntity, RoadmapItemEntity } from '../core/types.js';
import { SourceError, toError } from '../utils/error-handler.js';
import { parseRoadmap } from './roadmap-parser.js';
import {
  ChunkRecordSchema,
  CompetitiveListSchema,
  DecisionsFileSchema,
  JsonObjectSchema,
  QuestionsFileSchema,
  describeIssues
} from './schemas.js';
import type { ChunkRecord, KnowledgeSources } from './types.js';

export type SourcePaths = KnowledgeGraphConfig['sources'];

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw new SourceError(`Cannot read ${path}`, { cause: toError(error) });
  }
}

function parseJson(path: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SourceError(`Malformed JSON in ${path}`, { cause: toError(error) });
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, path: string, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SourceError(`Invalid data in ${path}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export class FileKnowledgeSources implements KnowledgeSources {
  private paths: SourcePaths;

  constructor(paths: SourcePaths) {
    this.paths = paths;
  }

  async loadRoadmapItems(): Promise<RoadmapItemEntity[]> {
    const markdown = await readOptional(this.paths.roadmapPath);
    return markdown === undefined ? [] : parseRoadmap(markdown);
  }

  async loadQuestions(): Promise<QuestionEntity[]> {
    const path = this.paths.questionsPath;
    const text = await readOptional(path);
    if (text === undefined) {
      return [];
    }
    return validate(QuestionsFileSchema, path, parseJson(path, text)).questions;
  }

  async loadDecisions(): Promise<DecisionEntity[]> {
    const path = this.paths.decisionsPath;
    const text = await readOptional(path);
    if (text === undefined) {
      return [];
    }
    return validate(DecisionsFileSchema, path, parseJson(path, text)).decisions;
  }

  async loadArchitectureAssessment(): Promise<JsonObject | undefined> {
    const path = this.paths.architecturePath;
    const text = await readOptional(path);
    if (text === undefined) {
      return undefined;
    }
    return validate(JsonObjectSchema, path, parseJson(path, text));
  }

  async loadCompetitiveAssessments(): Promise<JsonObject[]> {
    const path = this.paths.competitivePath;
    const text = await readOptional(path);
    if (text === undefined) {
      return [];
    }
    return validate(CompetitiveListSchema, path, parseJson(path, text));
  }

  /**
   * Chunks from the JSONL export, one record per line
   */
  async loadChunks(): Promise<ChunkRecord[]> {
    const path = this.paths.chunksPath;
    const text = await readOptional(path);
    if (text === undefined) {
      return [];
    }

    const records: ChunkRecord[] = [];
    const lines = text.split(/\r?\n/);
    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }
      const location = `${path}:${index + 1}`;
      records.push(validate(ChunkRecordSchema, location, parseJson(location, line)));
    });
    return records;
  }

  /**
   * Most recent modification time across the source files that exist
   */
  async lastModified(): Promise<Date | undefined> {
    let latest: Date | undefined;

    for (const path of Object.values(this.paths)) {
      try {
        const stats = await fs.stat(path);
        if (!latest || stats.mtime > latest) {
          latest = stats.mtime;
        }
      } catch (error) {
        if (!isMissingFile(error)) {
          throw new SourceError(`Cannot stat ${path}`, { cause: toError(error) });
        }
      }
    }

    return latest;
  }
}
