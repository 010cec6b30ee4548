/**
 * Shared Menu System
 *
 * Index-based menus: arrow keys + Enter/Space to pick, plus single-key
 * shortcuts for quick access.
 */

import { getCurrentThemeColor, isLightTheme } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', 'Q'
}

/** Anything carrying a DOM-style key name ('ArrowUp', 'Enter', 'w', ...) */
export interface MenuKey {
  key: string;
}

/**
 * Handle menu navigation. Returns the new selection index and whether
 * the current item was confirmed.
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  event: MenuKey
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;
  const key = event.key.toLowerCase();

  if (event.key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (event.key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (event.key === 'Enter' || event.key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Index of the item whose shortcut matches `key`, or -1.
 */
export function checkShortcut(
  items: SimpleMenuItem[],
  key: string
): number {
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && key.toLowerCase() === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a menu column centered on `centerX`.
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  }
): string {
  const themeColor = getCurrentThemeColor();
  const selectedStyle = isLightTheme() ? '\x1b[1;34m' : '\x1b[1;93m';
  const { centerX, startY, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? selectedStyle : `\x1b[2m${themeColor}`;

    const itemX = centerX - Math.floor(text.length / 2);
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}

export type PauseAction = 'resume' | 'restart' | 'modeSelect' | 'quit';

export const PAUSE_MENU_ITEMS: (SimpleMenuItem & { action: PauseAction })[] = [
  { label: 'RESUME', shortcut: 'ESC', action: 'resume' },
  { label: 'RESTART', shortcut: 'R', action: 'restart' },
  { label: 'CHANGE MODE', shortcut: 'M', action: 'modeSelect' },
  { label: 'QUIT', shortcut: 'Q', action: 'quit' },
];
