import { describe, it, expect } from 'vitest';
import { createGrid, paintGrid } from './grid';
import {
  POWER_UP_TYPES,
  activate,
  applyMagnet,
  choosePowerUpType,
  createPowerUpState,
  currentScoreMultiplier,
  currentSpeedMultiplier,
  isGhost,
  remainingFraction,
  shrinkAmount,
  tickPowerUp,
} from './powerups';
import { food } from './testing';

describe('power-up state', () => {
  it('starts with nothing active', () => {
    const state = createPowerUpState();
    expect(state.active).toBeNull();
    expect(currentSpeedMultiplier(state)).toBe(1);
    expect(currentScoreMultiplier(state)).toBe(1);
    expect(remainingFraction(state)).toBe(0);
  });

  it('replaces the active power-up', () => {
    const state = createPowerUpState();
    expect(activate(state, 'ghost')).toBeNull();
    expect(activate(state, 'speedBoost')).toBe('ghost');
    expect(isGhost(state)).toBe(false);
    expect(currentSpeedMultiplier(state)).toBe(1.5);
    expect(state.remainingTicks).toBe(50);
  });

  it('counts down and expires', () => {
    const state = createPowerUpState();
    activate(state, 'ghost');
    for (let i = 0; i < 39; i++) expect(tickPowerUp(state)).toBeNull();
    expect(remainingFraction(state)).toBe(1 / 40);
    expect(tickPowerUp(state)).toBe('ghost');
    expect(state.active).toBeNull();
    expect(tickPowerUp(state)).toBeNull();
  });

  it('computes shrink as half the body, rounded down', () => {
    expect(shrinkAmount('sizeDown', 9)).toBe(4);
    expect(shrinkAmount('sizeDown', 1)).toBe(0);
    expect(shrinkAmount('magnet', 9)).toBe(0);
  });

  it('draws every type across the weight range', () => {
    expect(choosePowerUpType(() => 0)).toBe('speedBoost');
    expect(choosePowerUpType(() => 0.999999)).toBe('sizeDown');
    const seen = new Set(POWER_UP_TYPES.map((_, i) => choosePowerUpType(() => (i + 0.5) / POWER_UP_TYPES.length)));
    expect(seen.size).toBeGreaterThan(3);
  });
});

describe('applyMagnet', () => {
  it('moves food in range one step along the dominant axis', () => {
    const grid = createGrid({ width: 20, height: 20 });
    const foods = [food(10, 4, 10), food(13, 11, 10), food(10, 9, 10), food(19, 19, 10)];
    paintGrid(grid, { body: [{ x: 10, y: 10 }], foods, obstacles: [], exit: null, portals: [] });

    expect(applyMagnet(grid, foods, { x: 10, y: 10 })).toBe(2);
    expect(foods.map(f => f.position)).toEqual([
      { x: 10, y: 5 },
      { x: 12, y: 11 },
      { x: 10, y: 9 },
      { x: 19, y: 19 },
    ]);
  });

  it('never pulls food onto an obstacle', () => {
    const grid = createGrid({ width: 20, height: 20 });
    const foods = [food(10, 5, 10)];
    paintGrid(grid, { body: [{ x: 10, y: 10 }], foods, obstacles: [{ x: 10, y: 6 }], exit: null, portals: [] });
    expect(applyMagnet(grid, foods, { x: 10, y: 10 })).toBe(0);
    expect(foods[0].position).toEqual({ x: 10, y: 5 });
  });
});
