/**
 * Snake renderer
 *
 * Turns a read-only SessionSnapshot plus the front end's cosmetic state
 * into one ANSI string per frame. Never mutates the snapshot.
 */

import { getCurrentThemeColor, getSubtleBackgroundColor, getVerticalAnchor } from '../utils';
import { renderSimpleMenu, PAUSE_MENU_ITEMS } from '../shared/menu';
import { applyShake, isFlashActive, isFlashVisible, type EffectsState } from '../shared/effects';
import { POWER_UP_EFFECTS } from './powerups';
import { DIFFICULTIES, DIFFICULTY_ORDER, MODES, MODE_ORDER } from './modes';
import type { Food, GameOverReason, GridSize, PowerUpType, SessionSnapshot, TickOutcome } from './types';

const TITLE = [
  '█▀▀ █▄ █ ▄▀█ █▄▀ █▀▀   ▄▀█ █▀█ █▀▀ ▄▀█ █▀▄ █▀▀',
  '▄▄█ █ ▀█ █▀█ █ █ ██▄   █▀█ █▀▄ █▄▄ █▀█ █▄▀ ██▄',
];

export const POWER_UP_COLORS: Record<PowerUpType, string> = {
  speedBoost: '\x1b[1;93m',
  slowMotion: '\x1b[1;94m',
  ghost: '\x1b[1;97m',
  doublePoints: '\x1b[1;92m',
  magnet: '\x1b[1;95m',
  sizeDown: '\x1b[1;91m',
};

export const PORTAL_COLOR = '\x1b[1;96m';

const BAR_WIDTH = 10;

// ============================================================================
// Layout
// ============================================================================

export interface BoardLayout {
  /** Column of the left border */
  left: number;
  /** Row of the top border */
  top: number;
  width: number;
  height: number;
  showTitle: boolean;
}

/**
 * Terminal size needed for a board: border, score line above, HUD below.
 */
export function minimumSize(grid: GridSize): { cols: number; rows: number } {
  return { cols: grid.width + 4, rows: grid.height + 4 };
}

/**
 * Where the board sits in a terminal of `cols` x `rows`. Null when it
 * doesn't fit.
 */
export function computeLayout(cols: number, rows: number, grid: GridSize): BoardLayout | null {
  const need = minimumSize(grid);
  if (cols < need.cols || rows < need.rows) return null;

  const showTitle = rows >= grid.height + 8 && cols >= TITLE[0].length + 2;
  const top = getVerticalAnchor(rows, grid.height + 2, {
    headerRows: showTitle ? 3 : 1,
    footerRows: 2,
    minTop: showTitle ? 4 : 2,
  });
  const left = Math.max(1, Math.floor((cols - grid.width - 2) / 2) + 1);
  return { left, top, width: grid.width, height: grid.height, showTitle };
}

// ============================================================================
// Text helpers
// ============================================================================

export function formatTime(ms: number): string {
  const totalSeconds = Math.ceil(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function progressBar(fraction: number, width: number = BAR_WIDTH): { filled: string; empty: string } {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filledCount = Math.round(clamped * width);
  return { filled: '█'.repeat(filledCount), empty: '░'.repeat(width - filledCount) };
}

const REASON_TEXT: Record<GameOverReason, string> = {
  wall: 'HIT THE WALL',
  selfCollision: 'BIT YOURSELF',
  obstacle: 'HIT AN OBSTACLE',
  timeUp: "TIME'S UP",
};

/**
 * Headline and subtitle for a finished session.
 */
export function outcomeMessage(outcome: TickOutcome): { headline: string; detail: string } {
  switch (outcome.kind) {
    case 'gameOver':
      return { headline: '══ GAME OVER ══', detail: REASON_TEXT[outcome.reason] };
    case 'levelComplete':
      return { headline: '══ MAZE CLEARED ══', detail: 'YOU FOUND THE EXIT' };
    case 'noSpace':
      return { headline: '══ BOARD FULL ══', detail: 'NOWHERE LEFT TO GROW' };
    case 'continue':
      return { headline: '', detail: '' };
  }
}

function foodGlyph(food: Food, frame: number): { char: string; color: string } {
  switch (food.kind) {
    case 'normal':
      return { char: frame % 10 < 5 ? '◆' : '◇', color: '\x1b[1;33m' };
    case 'bonus':
      return { char: '★', color: frame % 6 < 3 ? '\x1b[1;95m' : '\x1b[1;35m' };
    case 'power':
      return { char: '✚', color: food.grants ? POWER_UP_COLORS[food.grants] : '\x1b[1;97m' };
  }
}

function centered(row: number, centerX: number, text: string, style: string): string {
  const x = Math.max(1, centerX - Math.floor(text.length / 2));
  return `\x1b[${row};${x}H${style}${text}\x1b[0m`;
}

// ============================================================================
// Screens
// ============================================================================

export function renderTooSmall(cols: number, rows: number, grid: GridSize): string {
  const themeColor = getCurrentThemeColor();
  const need = minimumSize(grid);
  const needWidth = cols < need.cols;
  const needHeight = rows < need.rows;
  let hint: string;
  if (needWidth && needHeight) {
    hint = 'Make pane larger';
  } else if (needWidth) {
    hint = 'Make pane wider →';
  } else {
    hint = 'Make pane taller ↓';
  }
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);

  let output = '\x1b[2J\x1b[H';
  output += centered(centerY - 1, centerX, 'Terminal too small!', themeColor);
  output += centered(centerY + 1, centerX, `Need: ${need.cols}×${need.rows}  Have: ${cols}×${rows}`, '\x1b[2m');
  output += centered(centerY + 3, centerX, hint, `\x1b[1m${themeColor}`);
  return output;
}

export interface ModeSelectView {
  cols: number;
  rows: number;
  modeIndex: number;
  difficultyIndex: number;
  highScore: number;
}

export function renderModeSelect(view: ModeSelectView): string {
  const themeColor = getCurrentThemeColor();
  const centerX = Math.floor(view.cols / 2);
  const contentRows = MODE_ORDER.length + 10;
  let y = getVerticalAnchor(view.rows, contentRows, { minTop: 1 });

  let output = '\x1b[2J\x1b[H';
  if (view.cols >= TITLE[0].length + 2) {
    output += centered(y, centerX, TITLE[0], `${themeColor}\x1b[1m`);
    output += centered(y + 1, centerX, TITLE[1], `${themeColor}\x1b[1m`);
    y += 3;
  }

  output += centered(y, centerX, 'SELECT MODE', `\x1b[5m${themeColor}`);
  y += 2;

  output += renderSimpleMenu(
    MODE_ORDER.map(m => ({ label: MODES[m].name.toUpperCase() })),
    view.modeIndex,
    { centerX, startY: y, showShortcuts: false },
  );
  y += MODE_ORDER.length + 1;

  const mode = MODE_ORDER[view.modeIndex];
  output += centered(y, centerX, MODES[mode].description, `\x1b[2m${themeColor}`);
  y += 2;

  const difficulty = DIFFICULTY_ORDER[view.difficultyIndex];
  output += centered(y, centerX, `◄ ${DIFFICULTIES[difficulty].name.toUpperCase()} ►`, '\x1b[1;93m');
  output += centered(y + 1, centerX, DIFFICULTIES[difficulty].description, `\x1b[2m${themeColor}`);
  y += 3;

  output += centered(y, centerX, `HIGH: ${view.highScore.toString().padStart(4, '0')}`, themeColor);
  output += centered(y + 2, centerX, '↑↓ mode  ←→ difficulty  ENTER start  Q quit', `\x1b[2m${themeColor}`);
  return output;
}

export type Overlay =
  | { kind: 'none' }
  | { kind: 'ready' }
  | { kind: 'paused'; selection: number }
  | { kind: 'finished'; newHighScore: boolean };

export interface GameView {
  layout: BoardLayout;
  frame: number;
  highScore: number;
  effects: EffectsState;
  overlay: Overlay;
}

/**
 * Full game frame: title, score line, board, HUD and any overlay.
 */
export function renderGame(snap: SessionSnapshot, view: GameView): string {
  const themeColor = getCurrentThemeColor();
  const { layout, frame, effects, overlay } = view;

  const { offsetX, offsetY } = applyShake(effects.shake);
  const left = Math.max(1, layout.left + offsetX);
  const top = Math.max(2, layout.top + offsetY);
  const cellCol = (x: number) => left + 1 + x;
  const cellRow = (y: number) => top + 1 + y;
  const inBoard = (col: number, row: number) =>
    col > left && col <= left + layout.width && row > top && row <= top + layout.height;
  const centerX = left + Math.floor(layout.width / 2) + 1;
  const centerY = top + Math.floor(layout.height / 2);

  let output = '\x1b[2J\x1b[H';

  if (layout.showTitle) {
    const titleTop = top - 3;
    const glitching = frame % 60 >= 55 && frame % 60 < 58;
    output += centered(titleTop, centerX, TITLE[0], glitching ? '\x1b[91m' : `${themeColor}\x1b[1m`);
    output += centered(titleTop + 1, centerX + (glitching ? 1 : 0), TITLE[1], glitching ? '\x1b[96m' : `${themeColor}\x1b[1m`);
  }

  // Score line
  const eating = isFlashActive(effects.eatFlash);
  const scoreColor = eating ? '\x1b[1;33m' : themeColor;
  const scoreText = `SCORE: ${snap.score.toString().padStart(4, '0')}  HIGH: ${view.highScore.toString().padStart(4, '0')}`;
  output += `\x1b[${top - 1};${left}H${scoreColor}${scoreText}\x1b[0m`;
  const label = snap.label.toUpperCase();
  if (scoreText.length + label.length + 2 <= layout.width + 2) {
    output += `\x1b[${top - 1};${left + layout.width + 2 - label.length}H\x1b[2m${themeColor}${label}\x1b[0m`;
  }

  // Border
  const borderColor = isFlashVisible(effects.deathFlash) ? '\x1b[1;31m' : themeColor;
  output += `\x1b[${top};${left}H${borderColor}╔${'═'.repeat(layout.width)}╗\x1b[0m`;
  for (let y = 1; y <= layout.height; y++) {
    output += `\x1b[${top + y};${left}H${borderColor}║\x1b[0m`;
    output += `\x1b[${top + y};${left + layout.width + 1}H${borderColor}║\x1b[0m`;
  }
  output += `\x1b[${top + layout.height + 1};${left}H${borderColor}╚${'═'.repeat(layout.width)}╝\x1b[0m`;

  if (overlay.kind === 'paused') {
    output += centered(centerY - 2, centerX, '══ PAUSED ══', `\x1b[5m${themeColor}`);
    output += renderSimpleMenu(PAUSE_MENU_ITEMS, overlay.selection, {
      centerX,
      startY: centerY,
      showShortcuts: false,
    });
    output += centered(centerY + PAUSE_MENU_ITEMS.length + 1, centerX, '↑↓ select   ENTER confirm', `\x1b[2m${themeColor}`);
    return output;
  }

  // Obstacles and maze walls
  for (const o of snap.obstacles) {
    output += `\x1b[${cellRow(o.y)};${cellCol(o.x)}H\x1b[2m${themeColor}█\x1b[0m`;
  }
  if (snap.exit) {
    const exitColor = frame % 20 < 10 ? '\x1b[1;92m' : '\x1b[92m';
    output += `\x1b[${cellRow(snap.exit.y)};${cellCol(snap.exit.x)}H${exitColor}◎\x1b[0m`;
  }

  for (const [a, b] of snap.portals) {
    const glyph = frame % 16 < 8 ? '◉' : '○';
    output += `\x1b[${cellRow(a.y)};${cellCol(a.x)}H${PORTAL_COLOR}${glyph}\x1b[0m`;
    output += `\x1b[${cellRow(b.y)};${cellCol(b.x)}H${PORTAL_COLOR}${glyph}\x1b[0m`;
  }

  for (const food of snap.foods) {
    const glyph = foodGlyph(food, frame);
    output += `\x1b[${cellRow(food.position.y)};${cellCol(food.position.x)}H${glyph.color}${glyph.char}\x1b[0m`;
  }

  // Snake, tail first so the head wins on overlap
  const ghost = snap.powerUp?.type === 'ghost';
  const snakeColor = eating
    ? '\x1b[1;33m'
    : snap.powerUp ? POWER_UP_COLORS[snap.powerUp.type] : themeColor;
  for (let i = snap.body.length - 1; i >= 0; i--) {
    const seg = snap.body[i];
    const char = i === 0 ? '█' : ghost ? '░' : '▓';
    const brightness = i === 0 ? '\x1b[1m' : (i < 3 ? '' : '\x1b[2m');
    output += `\x1b[${cellRow(seg.y)};${cellCol(seg.x)}H${brightness}${snakeColor}${char}\x1b[0m`;
  }

  for (const p of effects.particles) {
    const px = Math.round(cellCol(p.x));
    const py = Math.round(cellRow(p.y));
    if (inBoard(px, py)) {
      const alpha = p.life > 10 ? '' : '\x1b[2m';
      output += `\x1b[${py};${px}H${alpha}${p.color}${p.char}\x1b[0m`;
    }
  }

  for (const popup of effects.popups) {
    const px = Math.round(cellCol(popup.x));
    const py = Math.round(cellRow(popup.y));
    if (inBoard(px, py)) {
      const popAlpha = popup.frames > 10 ? '\x1b[1m' : '\x1b[2m';
      output += `\x1b[${py};${px}H${popAlpha}${popup.color}${popup.text}\x1b[0m`;
    }
  }

  // HUD: power-up countdown and Time Trial clock
  const hudRow = top + layout.height + 2;
  let hud = '';
  if (snap.powerUp) {
    const effect = POWER_UP_EFFECTS[snap.powerUp.type];
    const bar = progressBar(snap.powerUp.remainingFraction);
    hud += `${POWER_UP_COLORS[snap.powerUp.type]}${effect.label} ${bar.filled}\x1b[0m${getSubtleBackgroundColor()}${bar.empty}\x1b[0m  `;
  }
  if (snap.timeRemainingMs !== null) {
    const urgent = snap.timeRemainingMs <= 10_000;
    hud += `${urgent ? '\x1b[1;31m' : themeColor}TIME ${formatTime(snap.timeRemainingMs)}\x1b[0m`;
  }
  if (hud) output += `\x1b[${hudRow};${left}H${hud}`;

  if (overlay.kind === 'ready') {
    output += centered(centerY, centerX, '[ PRESS ANY KEY ]', `\x1b[5m${themeColor}`);
    output += centered(centerY + 2, centerX, '↑↓←→ MOVE  ESC MENU', `\x1b[2m${themeColor}`);
  } else if (overlay.kind === 'finished') {
    const message = outcomeMessage(snap.outcome);
    const headlineColor = snap.outcome.kind === 'gameOver' ? '\x1b[1;31m' : '\x1b[1;92m';
    output += centered(centerY - 2, centerX, message.headline, headlineColor);
    output += centered(centerY - 1, centerX, message.detail, `\x1b[2m${themeColor}`);
    output += centered(centerY + 1, centerX, `FINAL SCORE: ${snap.score}`, themeColor);
    if (overlay.newHighScore) {
      output += centered(centerY + 2, centerX, '★ NEW HIGH SCORE ★', frame % 6 < 3 ? '\x1b[1;93m' : '\x1b[1;95m');
    }
    output += centered(centerY + 4, centerX, '[R] RESTART [M] MODES [Q] QUIT', `\x1b[2m${themeColor}`);
  }

  return output;
}
