// Domain layer: Saved game state
// Versioned snapshot schema; older versions are upgraded with fixed defaults

import { z } from 'zod';

export const CURRENT_SNAPSHOT_VERSION = 2;

const count = z.number().int().nonnegative();

const PlayerSnapshotV1Schema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  coherence: count,
  max_coherence: z.number().int().positive(),
  knowledge: z.array(z.string()).default([]),
  questions_answered: count.default(0),
  questions_correct: count.default(0),
  npcs_defeated: z.array(z.string()).default([]),
});

const PlayerSnapshotSchema = PlayerSnapshotV1Schema.extend({
  questions_wrong: count,
});

const NpcHistoryV1Schema = z.object({
  defeated: z.boolean(),
  opinion: z.number().int(),
});

const NpcHistorySchema = NpcHistoryV1Schema.extend({
  encounters: count,
  restored: z.boolean(),
});

const ConversationSnapshotSchema = z.object({
  npc_id: z.string().min(1),
  question_ids: z.array(z.string()).min(1),
  answer_orders: z.array(z.array(count)),
  cursor: count,
  correct_count: count,
});

const NpcPlacementSnapshotSchema = z.object({
  id: z.string().min(1),
  x: z.number().int(),
  y: z.number().int(),
  mode: z.enum(['idle', 'wandering']),
  ticks: count,
  cooldown: count,
});

const SnapshotV1Schema = z.object({
  version: z.literal(1),
  content_id: z.string().min(1),
  seed: z.number().int(),
  floor: z.number().int().positive(),
  player: PlayerSnapshotV1Schema,
  npc_history: z.record(NpcHistoryV1Schema).default({}),
  conversation: ConversationSnapshotSchema.nullable().default(null),
});

export const GameSnapshotSchema = z.object({
  version: z.literal(CURRENT_SNAPSHOT_VERSION),
  content_id: z.string().min(1),
  seed: z.number().int(),
  rng_state: z.number().int(),
  fixed: z.boolean(),
  floor: z.number().int().positive(),
  max_floors: z.number().int().positive(),
  status: z.enum(['playing', 'victory', 'defeat']),
  player: PlayerSnapshotSchema,
  npc_history: z.record(NpcHistorySchema),
  npcs: z.array(NpcPlacementSnapshotSchema),
  conversation: ConversationSnapshotSchema.nullable(),
  saved_at: z.string(),
});

export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;
export type PlayerSnapshot = z.infer<typeof PlayerSnapshotSchema>;
export type NpcHistorySnapshot = z.infer<typeof NpcHistorySchema>;
export type ConversationSnapshot = z.infer<typeof ConversationSnapshotSchema>;
export type NpcPlacementSnapshot = z.infer<typeof NpcPlacementSnapshotSchema>;
export type GameSnapshotV1 = z.infer<typeof SnapshotV1Schema>;

const VersionProbeSchema = z.object({ version: z.number().int() });

export type SnapshotParseResult =
  | { ok: true; snapshot: GameSnapshot }
  | { ok: false; reason: 'unsupported_version'; version: number }
  | { ok: false; reason: 'invalid'; issues: string[] };

/**
 * Version 1 saves predate the serialized rng, wander state and wrong-answer
 * count. The rng restarts from the seed, NPCs keep their regenerated spawn
 * positions and wrong answers are derived from the other two counters.
 */
export function upgradeSnapshotV1(legacy: GameSnapshotV1, defaultMaxFloors: number): GameSnapshot {
  const npcHistory: GameSnapshot['npc_history'] = {};
  for (const [id, entry] of Object.entries(legacy.npc_history)) {
    npcHistory[id] = { ...entry, encounters: 0, restored: false };
  }

  return {
    version: CURRENT_SNAPSHOT_VERSION,
    content_id: legacy.content_id,
    seed: legacy.seed,
    rng_state: legacy.seed,
    fixed: false,
    floor: legacy.floor,
    max_floors: Math.max(defaultMaxFloors, legacy.floor),
    status: 'playing',
    player: {
      ...legacy.player,
      questions_wrong: Math.max(0, legacy.player.questions_answered - legacy.player.questions_correct),
    },
    npc_history: npcHistory,
    npcs: [],
    conversation: legacy.conversation,
    saved_at: new Date(0).toISOString(),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseSnapshot(raw: unknown, defaultMaxFloors: number): SnapshotParseResult {
  const probe = VersionProbeSchema.safeParse(raw);
  if (!probe.success) {
    return { ok: false, reason: 'invalid', issues: formatIssues(probe.error) };
  }

  const { version } = probe.data;
  if (version === 1) {
    const legacy = SnapshotV1Schema.safeParse(raw);
    if (!legacy.success) {
      return { ok: false, reason: 'invalid', issues: formatIssues(legacy.error) };
    }
    return { ok: true, snapshot: upgradeSnapshotV1(legacy.data, defaultMaxFloors) };
  }

  if (version !== CURRENT_SNAPSHOT_VERSION) {
    return { ok: false, reason: 'unsupported_version', version };
  }

  const current = GameSnapshotSchema.safeParse(raw);
  if (!current.success) {
    return { ok: false, reason: 'invalid', issues: formatIssues(current.error) };
  }
  return { ok: true, snapshot: current.data };
}
