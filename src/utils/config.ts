// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export interface StorageConfig {
  contentDir: string;
  defaultContentSet: string;
  dbPath: string;
  autosave: boolean;
  sessionIdleTtlMs: number;
  sessionCleanupIntervalMs: number;
}

/**
 * Balance and layout settings for one game session.
 * A session receives a frozen copy and never sees later changes.
 */
export interface GameConfig {
  mapWidth: number;
  mapHeight: number;
  maxFloors: number;
  startingCoherence: number;
  maxCoherence: number;
  correctAnswerGain: number;
  wrongAnswerPenalty: number;
  enemyWrongAnswerPenalty: number;
  helperRestoreAmount: number;
  questionsPerNpc: number;
  /** Fraction of a conversation's questions that must be correct to defeat the NPC. */
  defeatThreshold: number;
  /** Undefined means a seed is drawn when the session starts. */
  seed?: number;
  /** Keep question and answer order as authored. */
  fixed: boolean;
  /** NPCs take idle/wander steps after each accepted command. */
  npcWander: boolean;
  scoreWeights: ScoreWeights;
}

export interface ScoreWeights {
  correctAnswer: number;
  npcDefeated: number;
  knowledgeModule: number;
  coherencePoint: number;
}

export interface SessionConfig extends GameConfig {
  contentId: string;
  seed: number;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  game: GameConfig;
}

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  correctAnswer: 100,
  npcDefeated: 200,
  knowledgeModule: 50,
  coherencePoint: 10,
};

export const DEFAULT_GAME_CONFIG: GameConfig = {
  mapWidth: 50,
  mapHeight: 25,
  maxFloors: 3,
  startingCoherence: 80,
  maxCoherence: 100,
  correctAnswerGain: 8,
  wrongAnswerPenalty: 30,
  enemyWrongAnswerPenalty: 45,
  helperRestoreAmount: 15,
  questionsPerNpc: 3,
  defeatThreshold: 1,
  fixed: false,
  npcWander: true,
  scoreWeights: DEFAULT_SCORE_WEIGHTS,
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'test' ? env.NODE_ENV : 'development';

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv,
  };
}

export function buildStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    contentDir: env.CONTENT_DIR || './content',
    defaultContentSet: env.CONTENT_SET || 'fundamentals',
    dbPath: env.DB_PATH || './data/saves.json',
    autosave: parseBoolean(env.GAME_AUTOSAVE, true),
    sessionIdleTtlMs: parseInt(env.SESSION_IDLE_TTL_MINUTES || '60', 10) * 60 * 1000,
    sessionCleanupIntervalMs: parseInt(env.SESSION_CLEANUP_INTERVAL_SECONDS || '60', 10) * 1000,
  };
}

export function buildGameConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  const d = DEFAULT_GAME_CONFIG;

  return {
    mapWidth: parseInt(env.GAME_MAP_WIDTH || String(d.mapWidth), 10),
    mapHeight: parseInt(env.GAME_MAP_HEIGHT || String(d.mapHeight), 10),
    maxFloors: parseInt(env.GAME_MAX_FLOORS || String(d.maxFloors), 10),
    startingCoherence: parseInt(env.GAME_STARTING_COHERENCE || String(d.startingCoherence), 10),
    maxCoherence: parseInt(env.GAME_MAX_COHERENCE || String(d.maxCoherence), 10),
    correctAnswerGain: parseInt(env.GAME_CORRECT_GAIN || String(d.correctAnswerGain), 10),
    wrongAnswerPenalty: parseInt(env.GAME_WRONG_PENALTY || String(d.wrongAnswerPenalty), 10),
    enemyWrongAnswerPenalty: parseInt(env.GAME_ENEMY_PENALTY || String(d.enemyWrongAnswerPenalty), 10),
    helperRestoreAmount: parseInt(env.GAME_HELPER_RESTORE || String(d.helperRestoreAmount), 10),
    questionsPerNpc: parseInt(env.GAME_QUESTIONS_PER_NPC || String(d.questionsPerNpc), 10),
    defeatThreshold: parseFloat(env.GAME_DEFEAT_THRESHOLD || String(d.defeatThreshold)),
    seed: parseOptionalInt(env.GAME_SEED),
    fixed: parseBoolean(env.GAME_FIXED, d.fixed),
    npcWander: parseBoolean(env.GAME_NPC_WANDER, d.npcWander),
    scoreWeights: { ...DEFAULT_SCORE_WEIGHTS },
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    storage: buildStorageConfig(env),
    game: buildGameConfig(env),
  };
}

/**
 * Freeze a game config into the immutable per-session configuration.
 */
export function buildSessionConfig(
  game: GameConfig,
  contentId: string,
  overrides: Partial<GameConfig> = {},
  drawSeed: () => number = () => Math.floor(Math.random() * 0x7fffffff)
): Readonly<SessionConfig> {
  const merged: GameConfig = { ...game, ...overrides, scoreWeights: { ...game.scoreWeights, ...overrides.scoreWeights } };
  const seed = merged.seed ?? drawSeed();

  return Object.freeze({
    ...merged,
    scoreWeights: Object.freeze({ ...merged.scoreWeights }),
    contentId,
    seed,
  });
}

// Validation
const NUMERIC_SETTINGS = [
  ['mapWidth', 'GAME_MAP_WIDTH'],
  ['mapHeight', 'GAME_MAP_HEIGHT'],
  ['maxFloors', 'GAME_MAX_FLOORS'],
  ['startingCoherence', 'GAME_STARTING_COHERENCE'],
  ['maxCoherence', 'GAME_MAX_COHERENCE'],
  ['correctAnswerGain', 'GAME_CORRECT_GAIN'],
  ['wrongAnswerPenalty', 'GAME_WRONG_PENALTY'],
  ['enemyWrongAnswerPenalty', 'GAME_ENEMY_PENALTY'],
  ['helperRestoreAmount', 'GAME_HELPER_RESTORE'],
  ['questionsPerNpc', 'GAME_QUESTIONS_PER_NPC'],
  ['defeatThreshold', 'GAME_DEFEAT_THRESHOLD'],
] as const;

export function validateGameConfig(config: GameConfig): string[] {
  const errors: string[] = [];

  // Comparisons below are all false for NaN, so catch it first
  const invalid = NUMERIC_SETTINGS.filter(([key]) => !Number.isFinite(config[key]));
  if (invalid.length > 0) {
    return invalid.map(([, env]) => `${env} must be a number`);
  }

  if (config.mapWidth < 8 || config.mapHeight < 8) {
    errors.push('Map must be at least 8x8 (GAME_MAP_WIDTH, GAME_MAP_HEIGHT)');
  }

  if (config.maxFloors < 1) {
    errors.push('At least one floor is required (GAME_MAX_FLOORS)');
  }

  if (config.maxCoherence <= 0) {
    errors.push('Maximum coherence must be positive (GAME_MAX_COHERENCE)');
  }

  if (config.startingCoherence <= 0 || config.startingCoherence > config.maxCoherence) {
    errors.push('Starting coherence must be between 1 and the maximum (GAME_STARTING_COHERENCE)');
  }

  if (config.questionsPerNpc < 1) {
    errors.push('Each NPC must ask at least one question (GAME_QUESTIONS_PER_NPC)');
  }

  if (!(config.defeatThreshold > 0 && config.defeatThreshold <= 1)) {
    errors.push('Defeat threshold must be in (0, 1] (GAME_DEFEAT_THRESHOLD)');
  }

  if (
    config.correctAnswerGain < 0 ||
    config.wrongAnswerPenalty < 0 ||
    config.enemyWrongAnswerPenalty < 0 ||
    config.helperRestoreAmount < 0
  ) {
    errors.push('Coherence gains and penalties cannot be negative');
  }

  return errors;
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!(config.storage.sessionIdleTtlMs > 0) || !(config.storage.sessionCleanupIntervalMs > 0)) {
    errors.push('Session idle TTL and cleanup interval must be positive (SESSION_IDLE_TTL_MINUTES, SESSION_CLEANUP_INTERVAL_SECONDS)');
  }

  return errors.concat(validateGameConfig(config.game));
}
