// Infrastructure layer: Content set loader
// Reads a content directory of JSON files and validates it into a ContentBundle

import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type {
  ContentBundle,
  FloorLayout,
  NpcRecord,
  Question,
  TerminalRecord,
} from '@/domain/content/types.js';
import { NPC_TYPE_BEHAVIOR } from '@/domain/game/types.js';
import { MapGenerator, floodFill } from '@/infrastructure/game/MapGenerator.js';
import { ContentLoadError, InvariantViolationError } from '@/utils/errors.js';
import { contentLogger } from '@/utils/logger.js';

const CONTENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const AnswerSchema = z.object({
  text: z.string().min(1),
  correct: z.boolean(),
  response: z.string().default(''),
  rewardKnowledge: z.string().min(1).optional(),
});

const QuestionBaseSchema = z.object({
  id: z.string().min(1),
  topic: z.string().default('general'),
  text: z.string().min(1),
});

const QuestionSchema = z.discriminatedUnion('kind', [
  QuestionBaseSchema.extend({
    kind: z.literal('multiple_choice'),
    answers: z.array(AnswerSchema).min(2),
  }),
  QuestionBaseSchema.extend({
    kind: z.enum(['short_answer', 'yes_no']),
    acceptedAnswer: z.string().min(1),
    matchType: z.enum(['exact', 'numeric', 'complexity']).default('exact'),
    caseSensitive: z.boolean().default(false),
    correctResponse: z.string().default('Correct.'),
    incorrectResponse: z.string().default('Not quite.'),
    rewardKnowledge: z.string().min(1).optional(),
  }),
]);

const NpcSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  floor: z.number().int().positive(),
  type: z.enum(['specialist', 'helper', 'enemy']),
  required: z.boolean().optional(),
  questionIds: z.array(z.string()).default([]),
  greeting: z.string().default('...'),
  glyph: z
    .string()
    .regex(/^[A-Za-z]$/, 'glyph must be a single letter')
    .refine((glyph) => glyph !== 'T', 'glyph T is reserved for terminals'),
  color: z.string().default('white'),
});

const PositionSchema = z.object({ x: z.number().int().nonnegative(), y: z.number().int().nonnegative() });

const TerminalSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  lines: z.array(z.string()),
  floor: z.number().int().positive(),
  positionHint: PositionSchema.optional(),
});

const LayoutSchema = z.object({
  floor: z.number().int().positive(),
  rows: z.array(z.string()).min(1),
});

const ManifestSchema = z.object({
  title: z.string().min(1),
});

export interface RawContentSet {
  manifest?: unknown;
  questions: unknown;
  npcs: unknown;
  terminals?: unknown;
  levels?: unknown;
}

export interface ContentSource {
  load(contentId: string): Promise<ContentBundle>;
}

function parseFile<T extends z.ZodTypeAny>(
  contentId: string,
  file: string,
  schema: T,
  raw: unknown
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ContentLoadError(`Invalid ${file} in content set "${contentId}"`, { issues: issues.join('; ') });
  }
  return result.data;
}

function indexById<T extends { id: string }>(contentId: string, file: string, items: T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    if (index.has(item.id)) {
      throw new ContentLoadError(`Duplicate id "${item.id}" in ${file} of content set "${contentId}"`);
    }
    index.set(item.id, item);
  }
  return index;
}

/**
 * Build an immutable bundle from already-read JSON values.
 */
export function buildContentBundle(contentId: string, raw: RawContentSet): ContentBundle {
  const manifest = raw.manifest === undefined
    ? { title: contentId }
    : parseFile(contentId, 'manifest.json', ManifestSchema, raw.manifest);

  const questionList: Question[] = parseFile(contentId, 'questions.json', z.array(QuestionSchema), raw.questions);
  for (const question of questionList) {
    if (question.kind === 'multiple_choice' && !question.answers.some((answer) => answer.correct)) {
      throw new ContentLoadError(`Question "${question.id}" has no correct answer`, { contentId });
    }
  }

  const npcList: NpcRecord[] = parseFile(contentId, 'npcs.json', z.array(NpcSchema), raw.npcs).map((npc) => ({
    ...npc,
    required: npc.required ?? NPC_TYPE_BEHAVIOR[npc.type].requiredByDefault,
  }));

  const terminalList: TerminalRecord[] = raw.terminals === undefined
    ? []
    : parseFile(contentId, 'terminals.json', z.array(TerminalSchema), raw.terminals);

  const layoutList: FloorLayout[] = raw.levels === undefined
    ? []
    : parseFile(contentId, 'levels.json', z.array(LayoutSchema), raw.levels);

  const questions = indexById(contentId, 'questions.json', questionList);
  const npcs = indexById(contentId, 'npcs.json', npcList);
  const terminals = indexById(contentId, 'terminals.json', terminalList);

  for (const npc of npcs.values()) {
    const missing = npc.questionIds.filter((id) => !questions.has(id));
    if (missing.length > 0) {
      contentLogger.warn('NPC references unknown questions', { contentId, npcId: npc.id, missing: missing.join(',') });
    }
  }

  const layouts = new Map<number, FloorLayout>();
  const generator = new MapGenerator();
  for (const layout of layoutList) {
    if (layouts.has(layout.floor)) {
      throw new ContentLoadError(`Duplicate layout for floor ${layout.floor}`, { contentId });
    }
    try {
      const { map } = generator.parseLayout(layout);
      const reached = floodFill(map.walkable, map.spawn);
      const disconnected = map.walkable.some((row, y) => row.some((open, x) => open && !reached[y][x]));
      if (disconnected) {
        contentLogger.warn('Authored layout has unreachable cells', { contentId, floor: layout.floor });
      }
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        throw new ContentLoadError(`Layout for floor ${layout.floor} is unusable: ${error.message}`, { contentId });
      }
      throw error;
    }
    layouts.set(layout.floor, { floor: layout.floor, rows: [...layout.rows] });
  }

  return Object.freeze({
    id: contentId,
    title: manifest.title,
    questions,
    npcs,
    terminals,
    layouts,
  });
}

/**
 * Loads content sets from `<contentDir>/<id>/`. Bundles are cached per id.
 */
export class ContentLoader implements ContentSource {
  private cache = new Map<string, ContentBundle>();

  constructor(private readonly contentDir: string) {}

  async load(contentId: string): Promise<ContentBundle> {
    if (!CONTENT_ID_PATTERN.test(contentId)) {
      throw new ContentLoadError(`Invalid content set id "${contentId}"`);
    }

    const cached = this.cache.get(contentId);
    if (cached) return cached;

    const directory = join(this.contentDir, contentId);
    const bundle = buildContentBundle(contentId, {
      manifest: await this.readJson(directory, 'manifest.json', false),
      questions: await this.readJson(directory, 'questions.json', true),
      npcs: await this.readJson(directory, 'npcs.json', true),
      terminals: await this.readJson(directory, 'terminals.json', false),
      levels: await this.readJson(directory, 'levels.json', false),
    });

    contentLogger.info('Content set loaded', {
      contentId,
      questions: bundle.questions.size,
      npcs: bundle.npcs.size,
      terminals: bundle.terminals.size,
      layouts: bundle.layouts.size,
    });

    this.cache.set(contentId, bundle);
    return bundle;
  }

  async listAvailable(): Promise<string[]> {
    try {
      const entries = await readdir(this.contentDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && CONTENT_ID_PATTERN.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw new ContentLoadError(`Cannot read content directory ${this.contentDir}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async readJson(directory: string, file: string, required: boolean): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(join(directory, file), 'utf-8');
    } catch (error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      if (missing && !required) {
        return undefined;
      }
      throw new ContentLoadError(missing ? `Missing ${file} in ${directory}` : `Cannot read ${file} in ${directory}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ContentLoadError(`${file} in ${directory} is not valid JSON`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
