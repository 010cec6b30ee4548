/**
 * Snake Rule Engine — Pure Game Logic
 *
 * One call to step() is one tick: input, movement, collisions, food,
 * power-ups, mode end conditions. Terminal outcomes are returned, never
 * thrown, and freeze the session.
 */

import { coordKey, createGrid, isInBounds, paintGrid, portalExit, sameCoord, wrapCoordinate } from './grid';
import {
  activate,
  applyMagnet,
  createPowerUpState,
  currentScoreMultiplier,
  currentSpeedMultiplier,
  isGhost,
  isMagnetActive,
  remainingFraction,
  shrinkAmount,
  tickPowerUp,
} from './powerups';
import { advance, commitMove, createSnake, grow, isReverse, opposite, tailVacates } from './snake';
import { createPowerFood, createRegularFood, loadMaze, placeFood, placeObstacles } from './spawner';
import type {
  Coordinate,
  Direction,
  GameEvent,
  ModeConfig,
  PortalPair,
  RandomSource,
  SessionSnapshot,
  SessionState,
  Snake,
  TickOutcome,
  TickResult,
} from './types';

export const START_LENGTH = 3;

const CONTINUE: TickOutcome = { kind: 'continue' };

/** Tick intervals like 100 / 1.5 don't sum to exact milliseconds */
const TIME_EPSILON_MS = 1e-6;

// ============================================================================
// Session creation
// ============================================================================

export interface SessionOptions {
  random?: RandomSource;
  startLength?: number;
}

export function createSession(config: ModeConfig, options: SessionOptions = {}): SessionState {
  const random = options.random ?? Math.random;
  const startLength = options.startLength ?? START_LENGTH;

  let snake: Snake;
  let obstacles: Coordinate[] = [];
  let exit: Coordinate | null = null;
  let portals: PortalPair[] = [];

  if (config.mazeLayout !== null) {
    const maze = loadMaze(config.mazeLayout);
    snake = createSnake(maze.start, 'right', startLength);
    obstacles = maze.walls;
    exit = maze.exit;
    portals = maze.portals;
  } else {
    const start = { x: Math.floor(config.grid.width / 2), y: Math.floor(config.grid.height / 2) };
    snake = createSnake(start, 'right', startLength);
    if (config.obstacleCount > 0) {
      obstacles = placeObstacles(config, snake, random);
    }
  }

  const state: SessionState = {
    config,
    grid: createGrid(config.grid),
    snake,
    foods: [],
    obstacles,
    obstacleKeys: new Set(obstacles.map(coordKey)),
    exit,
    portals,
    powerUp: createPowerUpState(),
    score: 0,
    ticks: 0,
    elapsedMs: 0,
    tickIntervalMs: config.baseIntervalMs,
    ticksSincePowerFood: 0,
    status: 'running',
    outcome: CONTINUE,
    pendingDirection: null,
    random,
  };

  syncGrid(state);
  if (!spawnRegularFood(state)) {
    state.status = 'noSpace';
    state.outcome = { kind: 'noSpace' };
  }
  return state;
}

/**
 * Rewrite grid occupancy from the session's entities.
 */
export function syncGrid(state: SessionState): void {
  paintGrid(state.grid, {
    body: state.snake.body,
    foods: state.foods,
    obstacles: state.obstacles,
    exit: state.exit,
    portals: state.portals,
  });
}

/**
 * Replace the obstacle set (session start, or hand-built layouts).
 */
export function setObstacles(state: SessionState, obstacles: Coordinate[]): void {
  state.obstacles = obstacles;
  state.obstacleKeys = new Set(obstacles.map(coordKey));
  syncGrid(state);
}

function spawnRegularFood(state: SessionState): boolean {
  const position = placeFood(state.grid, state.random);
  if (!position) return false;
  state.foods.push(createRegularFood(position, state.config, state.random));
  syncGrid(state);
  return true;
}

function maybeSpawnPowerFood(state: SessionState): void {
  if (state.foods.some(f => f.kind === 'power')) return;
  state.ticksSincePowerFood++;
  if (state.ticksSincePowerFood < state.config.powerUpIntervalTicks) return;

  const position = placeFood(state.grid, state.random);
  // A full board just skips this power food
  if (!position) return;
  state.foods.push(createPowerFood(position, state.config, state.random));
  state.ticksSincePowerFood = 0;
  syncGrid(state);
}

// ============================================================================
// Input
// ============================================================================

/**
 * Buffer a direction for the next tick. The latest call wins.
 */
export function queueDirection(state: SessionState, direction: Direction): void {
  state.pendingDirection = direction;
}

// ============================================================================
// Collision helpers
// ============================================================================

const CLOCKWISE: Record<Direction, Direction> = {
  up: 'right',
  right: 'down',
  down: 'left',
  left: 'up',
};

/**
 * Heading to take when an unkillable snake meets the board edge:
 * clockwise turn, then counter-clockwise, then straight back.
 */
export function bounceHeading(state: SessionState): Direction {
  const { snake, grid } = state;
  const cw = CLOCKWISE[snake.heading];
  const candidates: Direction[] = [cw, opposite(cw), opposite(snake.heading)];
  for (const dir of candidates) {
    if (isInBounds(grid, advance(snake, dir))) return dir;
  }
  return opposite(snake.heading);
}

function hitsBody(snake: Snake, target: Coordinate): boolean {
  const end = tailVacates(snake) ? snake.body.length - 1 : snake.body.length;
  for (let i = 0; i < end; i++) {
    if (sameCoord(snake.body[i], target)) return true;
  }
  return false;
}

function finish(state: SessionState, outcome: TickOutcome, events: GameEvent[]): TickResult {
  state.outcome = outcome;
  switch (outcome.kind) {
    case 'gameOver': state.status = 'gameOver'; break;
    case 'levelComplete': state.status = 'levelComplete'; break;
    case 'noSpace': state.status = 'noSpace'; break;
    case 'continue': break;
  }
  return { outcome, events };
}

// ============================================================================
// Tick
// ============================================================================

/**
 * Advance the session by one tick.
 */
export function step(state: SessionState): TickResult {
  if (state.status !== 'running') {
    return { outcome: state.outcome, events: [] };
  }

  const { config, snake, powerUp } = state;
  const events: GameEvent[] = [];
  const ghost = isGhost(powerUp);

  // Input
  if (state.pendingDirection !== null && !isReverse(snake.heading, state.pendingDirection)) {
    snake.heading = state.pendingDirection;
  }
  state.pendingDirection = null;

  state.ticks++;
  state.elapsedMs += state.tickIntervalMs;

  // Movement and board edges
  let newHead = advance(snake, snake.heading);
  if (!isInBounds(state.grid, newHead)) {
    if (ghost || config.wrapWalls) {
      newHead = wrapCoordinate(state.grid, newHead);
      events.push({ type: 'wrapped', at: newHead });
    } else if (config.deathOnCollision) {
      return finish(state, { kind: 'gameOver', reason: 'wall' }, events);
    } else {
      snake.heading = bounceHeading(state);
      newHead = advance(snake, snake.heading);
      events.push({ type: 'bounced', heading: snake.heading });
    }
  }

  // Portals (maze)
  const portalTo = portalExit(state.portals, newHead);
  if (portalTo) {
    events.push({ type: 'teleported', from: newHead, to: portalTo });
    newHead = portalTo;
  }

  // Self and obstacles
  if (!ghost && config.deathOnCollision) {
    if (hitsBody(snake, newHead)) {
      return finish(state, { kind: 'gameOver', reason: 'selfCollision' }, events);
    }
    if (state.obstacleKeys.has(coordKey(newHead))) {
      return finish(state, { kind: 'gameOver', reason: 'obstacle' }, events);
    }
  }

  // Food (effects land before the power-up countdown below)
  let needsRegularFood = false;
  const foodIndex = state.foods.findIndex(f => sameCoord(f.position, newHead));
  if (foodIndex !== -1) {
    const [food] = state.foods.splice(foodIndex, 1);
    const points = Math.round(food.value * currentScoreMultiplier(powerUp));
    state.score += points;
    events.push({ type: 'ate', food, points });

    if (food.grants) {
      activate(powerUp, food.grants);
      events.push({ type: 'powerUp', powerUp: food.grants });
      const shrink = shrinkAmount(food.grants, snake.body.length);
      if (shrink > 0) grow(snake, -shrink);
    } else {
      needsRegularFood = true;
    }
    grow(snake, config.growthPerFood);
  }

  commitMove(snake, newHead);
  syncGrid(state);

  if (needsRegularFood && !spawnRegularFood(state)) {
    return finish(state, { kind: 'noSpace' }, events);
  }
  maybeSpawnPowerFood(state);

  if (isMagnetActive(powerUp) && applyMagnet(state.grid, state.foods, newHead) > 0) {
    syncGrid(state);
  }

  const expired = tickPowerUp(powerUp);
  if (expired) {
    events.push({ type: 'powerUpExpired', powerUp: expired });
  }

  // Mode end conditions
  if (timeRemaining(config, state.elapsedMs) === 0) {
    return finish(state, { kind: 'gameOver', reason: 'timeUp' }, events);
  }
  if (state.exit && sameCoord(newHead, state.exit)) {
    return finish(state, { kind: 'levelComplete' }, events);
  }

  state.tickIntervalMs = config.baseIntervalMs / currentSpeedMultiplier(powerUp);
  return { outcome: CONTINUE, events };
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * Milliseconds left on the clock, 0 once the limit is reached, null
 * without a limit.
 */
export function timeRemaining(config: ModeConfig, elapsedMs: number): number | null {
  if (config.timeLimitMs === null) return null;
  const remaining = config.timeLimitMs - elapsedMs;
  return remaining <= TIME_EPSILON_MS ? 0 : remaining;
}

/**
 * Copy of everything a renderer or host needs. Never shares arrays or
 * coordinates with the live session.
 */
export function snapshot(state: SessionState): SessionSnapshot {
  const { config, powerUp } = state;
  return {
    mode: config.mode,
    difficulty: config.difficulty,
    label: config.label,
    grid: { ...config.grid },
    body: state.snake.body.map(c => ({ ...c })),
    heading: state.snake.heading,
    foods: state.foods.map(f => ({ ...f, position: { ...f.position } })),
    obstacles: state.obstacles.map(c => ({ ...c })),
    exit: state.exit && { ...state.exit },
    portals: state.portals.map(([a, b]): PortalPair => [{ ...a }, { ...b }]),
    score: state.score,
    length: state.snake.body.length,
    ticks: state.ticks,
    elapsedMs: state.elapsedMs,
    timeRemainingMs: timeRemaining(config, state.elapsedMs),
    tickIntervalMs: state.tickIntervalMs,
    powerUp: powerUp.active === null
      ? null
      : { type: powerUp.active, remainingFraction: remainingFraction(powerUp) },
    status: state.status,
    outcome: state.outcome,
  };
}
