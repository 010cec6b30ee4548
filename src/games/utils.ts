/**
 * Shared utilities for the game front end
 *
 * Terminal surface, theme state, alternate buffer handling and layout.
 * The theme is configured by the host via setTheme().
 */

import {
  type ThemeName,
  DEFAULT_THEME,
  getAnsiColor,
  isLightTheme as checkLightTheme,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Terminal surface
// ============================================================================

export interface Disposable {
  dispose(): void;
}

export interface GameKeyEvent {
  key: string;
  domEvent: {
    key: string;
    preventDefault(): void;
    stopPropagation(): void;
  };
}

/**
 * The part of an xterm.js Terminal the game drives. The CLI implements it
 * on top of process.stdin/stdout.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  /** Null once an xterm.js terminal has been disposed */
  readonly element?: unknown;
  write(data: string): void;
  onKey(listener: (event: GameKeyEvent) => void): Disposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): Disposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: ThemeName = DEFAULT_THEME;

export function setTheme(theme: ThemeName): void {
  currentTheme = theme;
}

export function getTheme(): ThemeName {
  return currentTheme;
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with who put them there.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

export function isTerminalValid(terminal: GameTerminal | null | undefined): terminal is GameTerminal {
  if (!terminal) return false;
  return terminal.element !== null;
}

/**
 * Enter alternate screen buffer with state tracking.
 * Returns false if already in the buffer or the terminal is gone.
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot enter: terminal invalid (reason: ${reason})`);
    return false;
  }

  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H');

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot exit: terminal invalid (reason: ${reason})`);
    return false;
  }

  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Theme Color Utilities
// ============================================================================

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

/**
 * Muted color for walls and other background elements
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Layout Utilities
// ============================================================================

interface VerticalAnchorOptions {
  headerRows?: number;
  footerRows?: number;
  minTop?: number;
}

/**
 * Compute a vertically-centered top row for content while reserving header/footer space.
 */
export function getVerticalAnchor(
  terminalRows: number,
  contentRows: number,
  options: VerticalAnchorOptions = {}
): number {
  const headerRows = options.headerRows ?? 0;
  const footerRows = options.footerRows ?? 0;
  const minTop = Math.max(1, options.minTop ?? 1);

  const availableRows = terminalRows - headerRows - footerRows;
  const centeredTop = headerRows + Math.floor((availableRows - contentRows) / 2) + 1;

  return Math.max(minTop, centeredTop);
}

export type { ThemeName } from '../themes';
