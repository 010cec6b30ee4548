/**
 * Snake entity — body, heading and pending growth.
 */

import type { Coordinate, Direction, Snake } from './types';

export const DIRECTION_DELTAS: Record<Direction, Coordinate> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

const OPPOSITES: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function isReverse(current: Direction, next: Direction): boolean {
  return OPPOSITES[current] === next;
}

/**
 * Straight snake with the tail trailing behind the heading.
 */
export function createSnake(head: Coordinate, heading: Direction, length: number): Snake {
  const delta = DIRECTION_DELTAS[heading];
  const body: Coordinate[] = [];
  for (let i = 0; i < Math.max(1, length); i++) {
    body.push({ x: head.x - delta.x * i, y: head.y - delta.y * i });
  }
  return { body, heading, pendingGrowth: 0 };
}

/**
 * Where the head would land moving in `direction`. Does not mutate.
 */
export function advance(snake: Snake, direction: Direction): Coordinate {
  const h = snake.body[0];
  const delta = DIRECTION_DELTAS[direction];
  return { x: h.x + delta.x, y: h.y + delta.y };
}

/**
 * Positive: keep the tail for `by` upcoming moves.
 * Negative: drop tail segments now, never below length 1.
 */
export function grow(snake: Snake, by: number): void {
  if (by >= 0) {
    snake.pendingGrowth += by;
    return;
  }
  const removable = Math.min(-by, snake.body.length - 1);
  snake.body.splice(snake.body.length - removable, removable);
}

export function commitMove(snake: Snake, newHead: Coordinate): void {
  snake.body.unshift(newHead);
  if (snake.pendingGrowth > 0) {
    snake.pendingGrowth--;
  } else {
    snake.body.pop();
  }
}

/**
 * True when the tail cell will be vacated by the next commitMove.
 */
export function tailVacates(snake: Snake): boolean {
  return snake.pendingGrowth === 0;
}
