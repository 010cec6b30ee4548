/**
 * Terminal color themes
 *
 * ANSI escape codes for the snake board, HUD and menus.
 */

/**
 * Available theme identifiers
 */
export type ThemeName =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'bladerunner'
  | 'daylight'
  | 'solarizedLight';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Primary ANSI color */
  ansi: string;
  /** Dim color for walls and background detail */
  subtle: string;
  /** Dark text on a light background */
  light: boolean;
}

export const themes: Record<ThemeName, ThemeColors> = {
  cyan: { name: 'Cyberpunk', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  amber: { name: 'Fallout', ansi: '\x1b[93m', subtle: '\x1b[38;5;236m', light: false },
  green: { name: 'Matrix', ansi: '\x1b[92m', subtle: '\x1b[38;5;236m', light: false },
  white: { name: 'Ghost', ansi: '\x1b[97m', subtle: '\x1b[38;5;238m', light: false },
  hotpink: { name: 'Synthwave', ansi: '\x1b[95m', subtle: '\x1b[38;5;236m', light: false },
  blood: { name: 'Blood', ansi: '\x1b[91m', subtle: '\x1b[38;5;236m', light: false },
  bladerunner: { name: 'Blade Runner', ansi: '\x1b[38;5;208m', subtle: '\x1b[38;5;236m', light: false },
  daylight: { name: 'Daylight', ansi: '\x1b[34m', subtle: '\x1b[38;5;252m', light: true },
  solarizedLight: { name: 'Solarized Light', ansi: '\x1b[38;5;66m', subtle: '\x1b[38;5;187m', light: true },
};

const THEME_NAMES: ThemeName[] = [
  'cyan',
  'amber',
  'green',
  'white',
  'hotpink',
  'blood',
  'bladerunner',
  'daylight',
  'solarizedLight',
];

export const DEFAULT_THEME: ThemeName = 'cyan';

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(theme: ThemeName): string {
  return themes[theme].ansi;
}

export function isLightTheme(theme: ThemeName): boolean {
  return themes[theme].light;
}

export function getSubtleColor(theme: ThemeName): string {
  return themes[theme].subtle;
}

export function getThemeNames(): ThemeName[] {
  return [...THEME_NAMES];
}

export function isValidThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some(t => t === value);
}

export const ANSI_RESET = '\x1b[0m';
