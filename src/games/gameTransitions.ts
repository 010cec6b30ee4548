/**
 * Game Transitions - boot and exit sequences, plus the window events
 * the game uses to talk to its host.
 *
 * The game never persists anything itself: it dispatches events and the
 * host (CLI or web page) decides what to do with them.
 */

import type { SessionSnapshot } from './snake/types';
import { getCurrentThemeColor, type GameTerminal } from './utils';

const BOOT_DURATION = 600;  // ms for boot sequence
const EXIT_DURATION = 300;  // ms for exit wipe

const BOOT_MESSAGES = [
  'HATCHING SNAKE...',
  'SCATTERING FOOD...',
  'SHARPENING FANGS...',
  'CALIBRATING SLITHER...',
  'WARMING UP SCALES...',
];

const EXIT_MESSAGES = [
  'SNAKE ASLEEP',
  'BURROW SEALED',
  'GAME OVER, MAN',
];

const LOADING_FRAMES = [
  '[    ]',
  '[=   ]',
  '[==  ]',
  '[=== ]',
  '[====]',
];

function randomMessage(messages: string[]): string {
  return messages[Math.floor(Math.random() * messages.length)];
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Boot transition - plays before the game takes over the screen
 */
export async function playBootTransition(terminal: GameTerminal): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const centerX = Math.floor(terminal.cols / 2);
  const centerY = Math.floor(terminal.rows / 2);

  terminal.write('\x1b[?1049h');
  terminal.write('\x1b[?25l');
  terminal.write('\x1b[2J\x1b[H');

  const bootMsg = randomMessage(BOOT_MESSAGES);
  const msgX = Math.max(1, centerX - Math.floor(bootMsg.length / 2));
  terminal.write(`\x1b[${centerY - 1};${msgX}H${themeColor}${bootMsg}\x1b[0m`);

  const loadingLabel = 'LOADING: ';
  const barX = Math.max(1, centerX - Math.floor((loadingLabel.length + 6) / 2));
  for (const frame of LOADING_FRAMES) {
    terminal.write(`\x1b[${centerY + 1};${barX}H\x1b[2m${themeColor}${loadingLabel}${frame}\x1b[0m`);
    await sleep(BOOT_DURATION / LOADING_FRAMES.length);
  }

  // The game enters the alternate buffer itself
  terminal.write('\x1b[2J\x1b[H');
  terminal.write('\x1b[?1049l');
  terminal.write('\x1b[?25h');
}

/**
 * Exit transition - plays inside the game's alternate buffer on quit
 */
export async function playExitTransition(terminal: GameTerminal): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const { cols, rows } = terminal;

  const exitMsg = randomMessage(EXIT_MESSAGES);
  const msgX = Math.max(1, Math.floor(cols / 2) - Math.floor(exitMsg.length / 2));
  const msgY = Math.floor(rows / 2);
  terminal.write(`\x1b[2J\x1b[${msgY};${msgX}H\x1b[1m${themeColor}${exitMsg}\x1b[0m`);
  await sleep(150);

  // Screen wipe down
  for (let y = 1; y <= rows; y += 2) {
    terminal.write(`\x1b[${y};1H${' '.repeat(cols)}`);
    if (y + 1 <= rows) {
      terminal.write(`\x1b[${y + 1};1H${' '.repeat(cols)}`);
    }
    await sleep(EXIT_DURATION / (rows / 2));
  }
}

// ============================================================================
// Host events
// ============================================================================

export const GAME_EVENTS = {
  // Player quit; host tears down
  QUIT: 'snake-arcade:quit',
  // A session reached a terminal outcome; detail carries the final snapshot
  SESSION_END: 'snake-arcade:session-end',
} as const;

export interface SessionEndDetail {
  terminal: GameTerminal;
  snapshot: SessionSnapshot;
}

export function dispatchGameQuit(terminal: GameTerminal): void {
  window.dispatchEvent(new CustomEvent(GAME_EVENTS.QUIT, {
    detail: { terminal }
  }));
}

export function dispatchSessionEnd(terminal: GameTerminal, snapshot: SessionSnapshot): void {
  const detail: SessionEndDetail = { terminal, snapshot };
  window.dispatchEvent(new CustomEvent(GAME_EVENTS.SESSION_END, { detail }));
}
