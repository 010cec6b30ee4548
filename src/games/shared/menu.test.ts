import { describe, it, expect } from 'vitest';
import {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  PAUSE_MENU_ITEMS,
  type SimpleMenuItem,
} from './menu';
import { setTheme } from '../utils';

describe('navigateMenu', () => {
  describe('arrow navigation', () => {
    it('moves up with ArrowUp', () => {
      const result = navigateMenu(2, 5, { key: 'ArrowUp' });
      expect(result.newSelection).toBe(1);
      expect(result.confirmed).toBe(false);
    });

    it('moves down with ArrowDown', () => {
      const result = navigateMenu(2, 5, { key: 'ArrowDown' });
      expect(result.newSelection).toBe(3);
      expect(result.confirmed).toBe(false);
    });

    it('moves up with w key', () => {
      expect(navigateMenu(2, 5, { key: 'w' }).newSelection).toBe(1);
    });

    it('moves down with S key regardless of case', () => {
      expect(navigateMenu(2, 5, { key: 'S' }).newSelection).toBe(3);
    });
  });

  describe('wrapping behavior', () => {
    it('wraps up from first item to last', () => {
      expect(navigateMenu(0, 3, { key: 'ArrowUp' }).newSelection).toBe(2);
    });

    it('wraps down from last item to first', () => {
      expect(navigateMenu(2, 3, { key: 'ArrowDown' }).newSelection).toBe(0);
    });
  });

  describe('confirmation', () => {
    it('confirms with Enter', () => {
      const result = navigateMenu(1, 3, { key: 'Enter' });
      expect(result.confirmed).toBe(true);
      expect(result.newSelection).toBe(1);
    });

    it('confirms with Space', () => {
      expect(navigateMenu(1, 3, { key: ' ' }).confirmed).toBe(true);
    });
  });

  it('returns same selection for unhandled keys', () => {
    const result = navigateMenu(1, 3, { key: 'x' });
    expect(result.newSelection).toBe(1);
    expect(result.confirmed).toBe(false);
  });
});

describe('checkShortcut', () => {
  const items: SimpleMenuItem[] = [
    { label: 'Resume', shortcut: 'ESC' },
    { label: 'Restart', shortcut: 'R' },
    { label: 'Quit', shortcut: 'Q' },
    { label: 'No Shortcut' },
  ];

  it('returns index of matching shortcut (case insensitive)', () => {
    expect(checkShortcut(items, 'r')).toBe(1);
    expect(checkShortcut(items, 'Q')).toBe(2);
  });

  it('returns -1 for no match', () => {
    expect(checkShortcut(items, 'x')).toBe(-1);
  });

  it('handles ESC shortcut', () => {
    expect(checkShortcut(items, 'esc')).toBe(0);
  });

  it('returns first match when multiple items have same shortcut', () => {
    const dupeItems: SimpleMenuItem[] = [
      { label: 'First', shortcut: 'A' },
      { label: 'Second', shortcut: 'A' },
    ];
    expect(checkShortcut(dupeItems, 'a')).toBe(0);
  });
});

describe('renderSimpleMenu', () => {
  it('highlights the selected item and dims the rest', () => {
    setTheme('green');
    const out = renderSimpleMenu([{ label: 'A' }, { label: 'B' }], 1, {
      centerX: 10,
      startY: 4,
      showShortcuts: false,
    });
    // '  A  ' is 5 wide -> x = 10 - 2; '► B ◄' is 5 wide -> x = 8
    expect(out).toBe(
      '\x1b[4;8H\x1b[2m\x1b[92m  A  \x1b[0m' +
      '\x1b[5;8H\x1b[1;93m► B ◄\x1b[0m'
    );
  });

  it('appends shortcuts when asked', () => {
    setTheme('cyan');
    const out = renderSimpleMenu([{ label: 'QUIT', shortcut: 'Q' }], 0, { centerX: 20, startY: 1 });
    expect(out).toContain('► QUIT [Q] ◄');
  });
});

describe('PAUSE_MENU_ITEMS', () => {
  it('lists resume, restart, change mode and quit in order', () => {
    expect(PAUSE_MENU_ITEMS.map(i => i.action)).toEqual(['resume', 'restart', 'modeSelect', 'quit']);
  });

  it('has correct shortcuts', () => {
    expect(PAUSE_MENU_ITEMS.map(i => i.shortcut)).toEqual(['ESC', 'R', 'M', 'Q']);
  });
});
