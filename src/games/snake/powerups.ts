/**
 * Power-up manager
 *
 * One active power-up at a time. Effects are looked up from a table
 * keyed by type, so adding a power-up means adding a row, not a branch.
 */

import { cellAt, isInBounds, setCell } from './grid';
import type { Coordinate, Food, Grid, PowerUpState, PowerUpType, RandomSource } from './types';

// ============================================================================
// Effect table
// ============================================================================

export interface PowerUpEffect {
  label: string;
  description: string;
  durationTicks: number;
  speedMultiplier: number;
  scoreMultiplier: number;
  ghost: boolean;
  magnet: boolean;
  /** Fraction of the body dropped on activation */
  shrinkFraction: number;
  /** Relative spawn weight */
  spawnWeight: number;
}

export const POWER_UP_EFFECTS: Record<PowerUpType, PowerUpEffect> = {
  speedBoost: {
    label: 'SPEED',
    description: 'Move 50% faster',
    durationTicks: 50,
    speedMultiplier: 1.5,
    scoreMultiplier: 1,
    ghost: false,
    magnet: false,
    shrinkFraction: 0,
    spawnWeight: 0.2,
  },
  slowMotion: {
    label: 'SLOW-MO',
    description: 'Move 50% slower',
    durationTicks: 50,
    speedMultiplier: 0.5,
    scoreMultiplier: 1,
    ghost: false,
    magnet: false,
    shrinkFraction: 0,
    spawnWeight: 0.15,
  },
  ghost: {
    label: 'GHOST',
    description: 'Pass through walls and yourself',
    durationTicks: 40,
    speedMultiplier: 1,
    scoreMultiplier: 1,
    ghost: true,
    magnet: false,
    shrinkFraction: 0,
    spawnWeight: 0.1,
  },
  doublePoints: {
    label: '2X',
    description: 'Score twice as many points',
    durationTicks: 70,
    speedMultiplier: 1,
    scoreMultiplier: 2,
    ghost: false,
    magnet: false,
    shrinkFraction: 0,
    spawnWeight: 0.2,
  },
  magnet: {
    label: 'MAGNET',
    description: 'Pull nearby food toward you',
    durationTicks: 60,
    speedMultiplier: 1,
    scoreMultiplier: 1,
    ghost: false,
    magnet: true,
    shrinkFraction: 0,
    spawnWeight: 0.15,
  },
  sizeDown: {
    label: 'SHRINK',
    description: 'Lose half your length',
    durationTicks: 80,
    speedMultiplier: 1,
    scoreMultiplier: 1,
    ghost: false,
    magnet: false,
    shrinkFraction: 0.5,
    spawnWeight: 0.1,
  },
};

export const POWER_UP_TYPES: PowerUpType[] = [
  'speedBoost',
  'slowMotion',
  'ghost',
  'doublePoints',
  'magnet',
  'sizeDown',
];

/** Magnet pulls food whose distance to the head is inside (MIN, MAX) */
export const MAGNET_MIN_DISTANCE = 2;
export const MAGNET_MAX_DISTANCE = 8;

// ============================================================================
// State
// ============================================================================

export function createPowerUpState(): PowerUpState {
  return { active: null, remainingTicks: 0, durationTicks: 0 };
}

/**
 * Replace whatever is active. Returns the replaced type, if any.
 */
export function activate(state: PowerUpState, type: PowerUpType): PowerUpType | null {
  const previous = state.active;
  const duration = POWER_UP_EFFECTS[type].durationTicks;
  state.active = type;
  state.remainingTicks = duration;
  state.durationTicks = duration;
  return previous;
}

/**
 * Count down one tick. Returns the type that expired on this tick, if any.
 */
export function tickPowerUp(state: PowerUpState): PowerUpType | null {
  if (state.active === null) return null;
  state.remainingTicks = Math.max(0, state.remainingTicks - 1);
  if (state.remainingTicks > 0) return null;
  const expired = state.active;
  clearEffects(state);
  return expired;
}

export function clearEffects(state: PowerUpState): void {
  state.active = null;
  state.remainingTicks = 0;
  state.durationTicks = 0;
}

function activeEffect(state: PowerUpState): PowerUpEffect | null {
  return state.active === null ? null : POWER_UP_EFFECTS[state.active];
}

export function currentSpeedMultiplier(state: PowerUpState): number {
  return activeEffect(state)?.speedMultiplier ?? 1;
}

export function currentScoreMultiplier(state: PowerUpState): number {
  return activeEffect(state)?.scoreMultiplier ?? 1;
}

export function isGhost(state: PowerUpState): boolean {
  return activeEffect(state)?.ghost ?? false;
}

export function isMagnetActive(state: PowerUpState): boolean {
  return activeEffect(state)?.magnet ?? false;
}

export function remainingFraction(state: PowerUpState): number {
  if (state.active === null || state.durationTicks === 0) return 0;
  return state.remainingTicks / state.durationTicks;
}

/**
 * Segments to drop when a shrink power-up lands on a body of `length`.
 */
export function shrinkAmount(type: PowerUpType, length: number): number {
  return Math.floor(length * POWER_UP_EFFECTS[type].shrinkFraction);
}

/**
 * Weighted draw over spawnWeight.
 */
export function choosePowerUpType(random: RandomSource): PowerUpType {
  const total = POWER_UP_TYPES.reduce((sum, t) => sum + POWER_UP_EFFECTS[t].spawnWeight, 0);
  let roll = random() * total;
  for (const type of POWER_UP_TYPES) {
    roll -= POWER_UP_EFFECTS[type].spawnWeight;
    if (roll < 0) return type;
  }
  return POWER_UP_TYPES[POWER_UP_TYPES.length - 1];
}

// ============================================================================
// Magnet
// ============================================================================

/**
 * Move each food in range one cell toward the head along its dominant axis.
 * Food only ever moves onto an empty cell, so it never lands on the body.
 * Returns the number of foods moved.
 */
export function applyMagnet(grid: Grid, foods: Food[], headPos: Coordinate): number {
  let moved = 0;
  for (const food of foods) {
    const dx = food.position.x - headPos.x;
    const dy = food.position.y - headPos.y;
    const distance = Math.sqrt(dx * dx + dy * dy);
    if (distance <= MAGNET_MIN_DISTANCE || distance >= MAGNET_MAX_DISTANCE) continue;

    const target: Coordinate = Math.abs(dx) > Math.abs(dy)
      ? { x: food.position.x - Math.sign(dx), y: food.position.y }
      : { x: food.position.x, y: food.position.y - Math.sign(dy) };

    if (!isInBounds(grid, target) || cellAt(grid, target) !== 'empty') continue;

    setCell(grid, food.position, 'empty');
    setCell(grid, target, 'food');
    food.position = target;
    moved++;
  }
  return moved;
}
