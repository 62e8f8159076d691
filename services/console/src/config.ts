import { logger } from '@switchboard/shared';

const log = logger.child({ module: 'config' });

export type ConsoleMode = 'goal' | 'chat';

const VALID_MODES: ConsoleMode[] = ['goal', 'chat'];

export interface ConsoleConfig {
  dataDir: string;
  mode: ConsoleMode;
  maxIterations: number;
  /** Asked for at the prompt when unset */
  goal?: string;
}

function parseMode(raw: string | undefined): ConsoleMode {
  const value = (raw ?? 'goal').trim().toLowerCase();
  const mode = VALID_MODES.find((m) => m === value);
  if (!mode) {
    log.warn({ configured: raw, using: 'goal' }, 'invalid SWITCHBOARD_MODE, falling back to goal');
    return 'goal';
  }
  return mode;
}

function parseMaxIterations(raw: string | undefined): number {
  if (!raw) return 32;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    log.warn({ configured: raw, using: 32 }, 'invalid MAX_ITERATIONS, falling back to 32');
    return 32;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConsoleConfig {
  const config: ConsoleConfig = {
    dataDir: env.DATA_DIR ?? './data',
    mode: parseMode(env.SWITCHBOARD_MODE),
    maxIterations: parseMaxIterations(env.MAX_ITERATIONS),
    goal: env.GOAL?.trim() || undefined,
  };

  log.info(
    { dataDir: config.dataDir, mode: config.mode, maxIterations: config.maxIterations, hasGoal: !!config.goal },
    'console config loaded',
  );
  return config;
}
