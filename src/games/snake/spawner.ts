/**
 * Spawner — food on empty cells, obstacles and maze layouts at session start.
 */

import mazeData from './mazes.json';
import { coordKey, emptyCells } from './grid';
import { choosePowerUpType } from './powerups';
import type { Coordinate, Food, Grid, ModeConfig, PortalPair, RandomSource, Snake } from './types';

/** Random probes before falling back to a full scan */
export const MAX_SPAWN_ATTEMPTS = 100;

/** Share of regular food that spawns as bonus food */
const BONUS_FOOD_CHANCE = 0.2;
const BONUS_FOOD_FACTOR = 3;

// ============================================================================
// Food
// ============================================================================

/**
 * Pick a uniformly random empty cell. Null when the board is full.
 */
export function placeFood(grid: Grid, random: RandomSource): Coordinate | null {
  for (let attempt = 0; attempt < MAX_SPAWN_ATTEMPTS; attempt++) {
    const x = Math.floor(random() * grid.width);
    const y = Math.floor(random() * grid.height);
    if (grid.cells[y * grid.width + x] === 'empty') return { x, y };
  }

  const candidates = emptyCells(grid);
  if (candidates.length === 0) return null;
  return candidates[Math.floor(random() * candidates.length)];
}

export function createRegularFood(position: Coordinate, config: ModeConfig, random: RandomSource): Food {
  if (random() < BONUS_FOOD_CHANCE) {
    return { position, kind: 'bonus', value: config.foodValue * BONUS_FOOD_FACTOR };
  }
  return { position, kind: 'normal', value: config.foodValue };
}

export function createPowerFood(position: Coordinate, config: ModeConfig, random: RandomSource): Food {
  return { position, kind: 'power', value: config.foodValue, grants: choosePowerUpType(random) };
}

// ============================================================================
// Obstacles
// ============================================================================

/** Cells kept clear around the starting head */
const START_CLEARANCE = 2;
/** Obstacles stay this far from the board edge */
const EDGE_MARGIN = 2;

/**
 * Procedural layout for Obstacle mode. Never overlaps the starting body
 * and keeps a clear pocket around the starting head.
 */
export function placeObstacles(config: ModeConfig, snake: Snake, random: RandomSource): Coordinate[] {
  const { width, height } = config.grid;
  const start = snake.body[0];
  const blocked = new Set(snake.body.map(coordKey));
  const placed = new Map<string, Coordinate>();

  const spanX = width - EDGE_MARGIN * 2;
  const spanY = height - EDGE_MARGIN * 2;
  if (spanX <= 0 || spanY <= 0) return [];

  // Bounded: a crowded board simply gets fewer obstacles
  const maxAttempts = config.obstacleCount * 20;
  for (let attempt = 0; attempt < maxAttempts && placed.size < config.obstacleCount; attempt++) {
    const c = {
      x: EDGE_MARGIN + Math.floor(random() * spanX),
      y: EDGE_MARGIN + Math.floor(random() * spanY),
    };
    const key = coordKey(c);
    if (blocked.has(key) || placed.has(key)) continue;
    if (Math.abs(c.x - start.x) <= START_CLEARANCE && Math.abs(c.y - start.y) <= START_CLEARANCE) continue;
    placed.set(key, c);
  }

  return Array.from(placed.values());
}

// ============================================================================
// Mazes
// ============================================================================

export interface MazeLayout {
  id: string;
  name: string;
  width: number;
  height: number;
  walls: Coordinate[];
  exit: Coordinate;
  start: Coordinate;
  portals: PortalPair[];
}

interface RawMaze {
  id: string;
  name: string;
  rows: string[];
}

const RAW_MAZES: RawMaze[] = mazeData.mazes;

export function getMazeIds(): string[] {
  return RAW_MAZES.map(m => m.id);
}

/**
 * Parse a maze from its text rows: '#' wall, 'E' exit, 'S' start head,
 * and a digit on exactly two cells for each portal pair.
 */
export function parseMaze(raw: RawMaze): MazeLayout {
  const height = raw.rows.length;
  const width = height > 0 ? raw.rows[0].length : 0;
  const walls: Coordinate[] = [];
  let exit: Coordinate | null = null;
  let start: Coordinate | null = null;
  const portalEnds = new Map<string, Coordinate[]>();

  for (let y = 0; y < height; y++) {
    const row = raw.rows[y];
    if (row.length !== width) {
      throw new Error(`Maze "${raw.id}" row ${y} is ${row.length} wide, expected ${width}`);
    }
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      if (ch === '#') walls.push({ x, y });
      else if (ch === 'E') exit = { x, y };
      else if (ch === 'S') start = { x, y };
      else if (ch >= '0' && ch <= '9') {
        const ends = portalEnds.get(ch) ?? [];
        ends.push({ x, y });
        portalEnds.set(ch, ends);
      }
    }
  }

  if (!exit || !start) {
    throw new Error(`Maze "${raw.id}" needs one exit (E) and one start (S)`);
  }

  const portals: PortalPair[] = [];
  for (const [mark, ends] of portalEnds) {
    if (ends.length !== 2) {
      throw new Error(`Maze "${raw.id}" portal ${mark} has ${ends.length} ends, expected 2`);
    }
    portals.push([ends[0], ends[1]]);
  }

  return { id: raw.id, name: raw.name, width, height, walls, exit, start, portals };
}

export function loadMaze(id: string): MazeLayout {
  const raw = RAW_MAZES.find(m => m.id === id);
  if (!raw) throw new Error(`Unknown maze layout: ${id}`);
  return parseMaze(raw);
}
