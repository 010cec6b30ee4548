import { describe, it, expect } from 'vitest';
import { createGrid, setCell } from './grid';
import { resolveModeConfig } from './modes';
import { createSnake } from './snake';
import { createPowerFood, createRegularFood, getMazeIds, loadMaze, parseMaze, placeFood, placeObstacles } from './spawner';
import { seededRandom } from './testing';

describe('placeFood', () => {
  it('only lands on empty cells', () => {
    const grid = createGrid({ width: 6, height: 6 });
    for (let x = 0; x < 6; x++) {
      for (let y = 0; y < 5; y++) setCell(grid, { x, y }, 'snake');
    }
    const random = seededRandom(11);
    for (let i = 0; i < 20; i++) {
      const position = placeFood(grid, random);
      expect(position?.y).toBe(5);
    }
  });

  it('finds the last empty cell', () => {
    const grid = createGrid({ width: 5, height: 5 });
    grid.cells.fill('snake');
    setCell(grid, { x: 2, y: 3 }, 'empty');
    // Probes always hit (0,0), so the full scan has to find it
    expect(placeFood(grid, () => 0)).toEqual({ x: 2, y: 3 });
  });

  it('never picks a portal cell', () => {
    const grid = createGrid({ width: 5, height: 5 });
    grid.cells.fill('snake');
    setCell(grid, { x: 0, y: 0 }, 'portal');
    setCell(grid, { x: 4, y: 4 }, 'portal');
    setCell(grid, { x: 2, y: 2 }, 'empty');
    expect(placeFood(grid, seededRandom(6))).toEqual({ x: 2, y: 2 });

    setCell(grid, { x: 2, y: 2 }, 'snake');
    expect(placeFood(grid, seededRandom(6))).toBeNull();
  });

  it('returns null on a full board', () => {
    const grid = createGrid({ width: 5, height: 5 });
    grid.cells.fill('snake');
    expect(placeFood(grid, seededRandom(2))).toBeNull();
  });
});

describe('food kinds', () => {
  const config = resolveModeConfig('classic', 'medium');

  it('makes bonus food worth three times as much', () => {
    expect(createRegularFood({ x: 1, y: 1 }, config, () => 0.1)).toEqual({ position: { x: 1, y: 1 }, kind: 'bonus', value: 30 });
    expect(createRegularFood({ x: 1, y: 1 }, config, () => 0.5)).toEqual({ position: { x: 1, y: 1 }, kind: 'normal', value: 10 });
  });

  it('gives power food a power-up to grant', () => {
    expect(createPowerFood({ x: 2, y: 2 }, config, () => 0)).toEqual({
      position: { x: 2, y: 2 },
      kind: 'power',
      value: 10,
      grants: 'speedBoost',
    });
  });
});

describe('placeObstacles', () => {
  it('keeps clear of the snake, its surroundings and the edges', () => {
    const config = resolveModeConfig('obstacle', 'extreme');
    const snake = createSnake({ x: 16, y: 9 }, 'right', 3);
    const obstacles = placeObstacles(config, snake, seededRandom(5));

    expect(obstacles.length).toBeGreaterThan(0);
    expect(obstacles.length).toBeLessThanOrEqual(28);
    for (const o of obstacles) {
      expect(o.x).toBeGreaterThanOrEqual(2);
      expect(o.x).toBeLessThan(30);
      expect(o.y).toBeGreaterThanOrEqual(2);
      expect(o.y).toBeLessThan(16);
      const nearStart = Math.abs(o.x - 16) <= 2 && Math.abs(o.y - 9) <= 2;
      expect(nearStart).toBe(false);
    }
    expect(new Set(obstacles.map(o => `${o.x},${o.y}`)).size).toBe(obstacles.length);
  });
});

describe('mazes', () => {
  it('ships the layouts the difficulties point at', () => {
    expect(getMazeIds()).toEqual(['gallery', 'labyrinth']);
  });

  it('loads start, exit and walls', () => {
    const maze = loadMaze('gallery');
    expect(maze.width).toBe(32);
    expect(maze.height).toBe(18);
    expect(maze.start).toEqual({ x: 3, y: 1 });
    expect(maze.exit).toEqual({ x: 15, y: 9 });
    expect(maze.walls).toContainEqual({ x: 0, y: 0 });
    expect(maze.walls).not.toContainEqual(maze.start);
    expect(maze.portals).toEqual([
      [{ x: 20, y: 2 }, { x: 5, y: 15 }],
      [{ x: 10, y: 4 }, { x: 28, y: 12 }],
    ]);
  });

  it('parses a small layout', () => {
    const maze = parseMaze({ id: 'tiny', name: 'Tiny', rows: ['#####', '#S.E#', '#####'] });
    expect(maze.start).toEqual({ x: 1, y: 1 });
    expect(maze.exit).toEqual({ x: 3, y: 1 });
    expect(maze.walls).toHaveLength(12);
  });

  it('pairs portal digits', () => {
    const maze = parseMaze({ id: 'tiny', name: 'Tiny', rows: ['#####', '#S1E#', '#.1.#', '#####'] });
    expect(maze.portals).toEqual([[{ x: 2, y: 1 }, { x: 2, y: 2 }]]);
    expect(() => parseMaze({ id: 'bad', name: 'Bad', rows: ['#1SE#'] }))
      .toThrow('Maze "bad" portal 1 has 1 ends, expected 2');
  });

  it('rejects ragged rows and missing markers', () => {
    expect(() => parseMaze({ id: 'bad', name: 'Bad', rows: ['####', '#S.E#'] }))
      .toThrow('Maze "bad" row 1 is 5 wide, expected 4');
    expect(() => parseMaze({ id: 'bad', name: 'Bad', rows: ['#S.#'] }))
      .toThrow('Maze "bad" needs one exit (E) and one start (S)');
    expect(() => loadMaze('nowhere')).toThrow('Unknown maze layout: nowhere');
  });
});
