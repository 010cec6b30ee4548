/**
 * Snake Arcade — shared types
 *
 * Plain data only. Everything here is created and mutated by the
 * rule engine (engine.ts) and read by the terminal front end.
 */

// ============================================================================
// Geometry
// ============================================================================

export interface Coordinate {
  x: number;
  y: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

export type CellKind = 'empty' | 'snake' | 'food' | 'obstacle' | 'exit' | 'portal' | 'wall';

export interface GridSize {
  width: number;
  height: number;
}

/** Two linked cells; entering either one puts the head on the other */
export type PortalPair = [Coordinate, Coordinate];

export interface Grid extends GridSize {
  /** Row-major occupancy, index = y * width + x */
  cells: CellKind[];
}

// ============================================================================
// Entities
// ============================================================================

export interface Snake {
  /** Head first */
  body: Coordinate[];
  heading: Direction;
  pendingGrowth: number;
}

export type FoodKind = 'normal' | 'bonus' | 'power';

export interface Food {
  position: Coordinate;
  kind: FoodKind;
  value: number;
  grants?: PowerUpType;
}

export type PowerUpType =
  | 'speedBoost'
  | 'slowMotion'
  | 'ghost'
  | 'doublePoints'
  | 'magnet'
  | 'sizeDown';

export interface PowerUpState {
  active: PowerUpType | null;
  remainingTicks: number;
  durationTicks: number;
}

// ============================================================================
// Modes
// ============================================================================

export type GameMode = 'classic' | 'timeTrial' | 'obstacle' | 'maze' | 'zen';
export type Difficulty = 'easy' | 'medium' | 'hard' | 'extreme';

export interface ModeConfig {
  mode: GameMode;
  difficulty: Difficulty;
  label: string;
  grid: GridSize;
  baseIntervalMs: number;
  /** Time Trial only */
  timeLimitMs: number | null;
  /** False only in Zen */
  deathOnCollision: boolean;
  /** Board edges wrap around instead of killing (Easy) */
  wrapWalls: boolean;
  /** Maze only */
  mazeLayout: string | null;
  obstacleCount: number;
  foodValue: number;
  growthPerFood: number;
  powerUpIntervalTicks: number;
}

// ============================================================================
// Session
// ============================================================================

export type GameOverReason = 'wall' | 'selfCollision' | 'obstacle' | 'timeUp';

export type SessionStatus = 'running' | 'gameOver' | 'levelComplete' | 'noSpace';

export type TickOutcome =
  | { kind: 'continue' }
  | { kind: 'gameOver'; reason: GameOverReason }
  | { kind: 'levelComplete' }
  | { kind: 'noSpace' };

export type GameEvent =
  | { type: 'ate'; food: Food; points: number }
  | { type: 'powerUp'; powerUp: PowerUpType }
  | { type: 'powerUpExpired'; powerUp: PowerUpType }
  | { type: 'bounced'; heading: Direction }
  | { type: 'wrapped'; at: Coordinate }
  | { type: 'teleported'; from: Coordinate; to: Coordinate };

export interface TickResult {
  outcome: TickOutcome;
  events: GameEvent[];
}

export type RandomSource = () => number;

export interface SessionState {
  config: ModeConfig;
  grid: Grid;
  snake: Snake;
  foods: Food[];
  obstacles: Coordinate[];
  /** "x,y" keys of obstacles for constant-time lookups */
  obstacleKeys: Set<string>;
  exit: Coordinate | null;
  portals: PortalPair[];
  powerUp: PowerUpState;
  score: number;
  ticks: number;
  elapsedMs: number;
  /** Interval that schedules the next tick */
  tickIntervalMs: number;
  ticksSincePowerFood: number;
  status: SessionStatus;
  outcome: TickOutcome;
  pendingDirection: Direction | null;
  random: RandomSource;
}

/**
 * Read-only view handed to the renderer and host, once per tick and
 * once per frame.
 */
export interface SessionSnapshot {
  mode: GameMode;
  difficulty: Difficulty;
  label: string;
  grid: GridSize;
  body: readonly Coordinate[];
  heading: Direction;
  foods: readonly Food[];
  obstacles: readonly Coordinate[];
  exit: Coordinate | null;
  portals: readonly PortalPair[];
  score: number;
  length: number;
  ticks: number;
  elapsedMs: number;
  timeRemainingMs: number | null;
  tickIntervalMs: number;
  powerUp: { type: PowerUpType; remainingFraction: number } | null;
  status: SessionStatus;
  outcome: TickOutcome;
}
