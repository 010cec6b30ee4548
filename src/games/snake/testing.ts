/**
 * Deterministic fixtures for engine tests.
 */

import { syncGrid } from './engine';
import { createSnake } from './snake';
import type { Coordinate, Direction, Food, FoodKind, PowerUpType, RandomSource, SessionState } from './types';

/**
 * Linear congruential generator; same seed, same sequence.
 */
export function seededRandom(seed: number = 1): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

export function food(x: number, y: number, value: number, kind: FoodKind = 'normal', grants?: PowerUpType): Food {
  return grants ? { position: { x, y }, kind, value, grants } : { position: { x, y }, kind, value };
}

/**
 * Replace the board's food and repaint.
 */
export function setFoods(state: SessionState, foods: Food[]): void {
  state.foods = foods;
  syncGrid(state);
}

/**
 * Put a straight snake on the board and repaint.
 */
export function placeSnake(state: SessionState, head: Coordinate, heading: Direction, length: number): void {
  state.snake = createSnake(head, heading, length);
  syncGrid(state);
}
