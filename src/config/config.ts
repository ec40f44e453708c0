/**
 * AI configuration loaded from environment variables.
 *
 * Every tunable of the planner lives here so a host can retune behaviour
 * without touching goal code. Values are validated on load and a bad value
 * stops startup with an error naming the variable.
 *
 * @module config
 */

export interface AIConfig {
  /** Seed of the planner's random source; empty means nondeterministic */
  seed?: string;
  /** Planning steps allowed per processed turn */
  maxPlanningIterations: number;
  /** Chance the root goal starts a wander when it has nothing else to do */
  wanderChance: number;
  /** Chance an item collector goes after a visible item on an idle turn */
  itemPickupChance: number;
  /** Wander turns spent around an enemy's last known position */
  searchTurns: number;
  /** Radius of the search wander */
  searchRadius: number;
  /** Allies within this Chebyshev radius attract a fleeing actor */
  fleeAllyRadius: number;
  /** Default follow distance for protection targets */
  followDistance: number;
  /** Distance from spawn past which an idle actor walks home */
  leashRadius: number;
}

export const DEFAULT_AI_CONFIG: AIConfig = {
  maxPlanningIterations: 10,
  wanderChance: 1,
  itemPickupChance: 0.5,
  searchTurns: 5,
  searchRadius: 3,
  fleeAllyRadius: 15,
  followDistance: 3,
  leashRadius: 12,
};

type Env = Readonly<Record<string, string | undefined>>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `Invalid ${name}: expected an integer >= ${min}, got "${raw}"`,
    );
  }
  return value;
}

function readProbability(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid ${name}: expected a number in [0, 1], got "${raw}"`);
  }
  return value;
}

/**
 * Reads the AI configuration from `env`, falling back to defaults for
 * anything unset.
 *
 * @throws Error when a variable is set to an invalid value
 */
export function loadAIConfig(env: Env = process.env): AIConfig {
  const d = DEFAULT_AI_CONFIG;
  return {
    seed: env.AI_SEED || undefined,
    maxPlanningIterations: readInt(
      env,
      "AI_MAX_PLANNING_ITERATIONS",
      d.maxPlanningIterations,
      1,
    ),
    wanderChance: readProbability(env, "AI_WANDER_CHANCE", d.wanderChance),
    itemPickupChance: readProbability(
      env,
      "AI_ITEM_PICKUP_CHANCE",
      d.itemPickupChance,
    ),
    searchTurns: readInt(env, "AI_SEARCH_TURNS", d.searchTurns, 0),
    searchRadius: readInt(env, "AI_SEARCH_RADIUS", d.searchRadius, 0),
    fleeAllyRadius: readInt(env, "AI_FLEE_ALLY_RADIUS", d.fleeAllyRadius, 0),
    followDistance: readInt(env, "AI_FOLLOW_DISTANCE", d.followDistance, 1),
    leashRadius: readInt(env, "AI_LEASH_RADIUS", d.leashRadius, 0),
  };
}

/**
 * Process-wide configuration.
 */
export const CONFIG: AIConfig = loadAIConfig();
