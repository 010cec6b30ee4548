/**
 * CLI entry point for snake-arcade
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout onto the
 * GameTerminal surface, so the game runs directly in any terminal
 * emulator.
 */

// ---------------------------------------------------------------------------
// Window polyfill: the game talks to its host through window events.
// Node 20 ships EventTarget and CustomEvent, so a bare EventTarget will do.
// ---------------------------------------------------------------------------

const windowPolyfill = new EventTarget();

if (typeof globalThis.window === 'undefined') {
  Object.assign(globalThis, { window: windowPolyfill });
}

import { runSnakeGame, setTheme, GAME_EVENTS, playBootTransition, playExitTransition, type GameKeyEvent, type GameTerminal } from './games';
import { DIFFICULTIES, DIFFICULTY_ORDER, MODES, MODE_ORDER, ConfigError } from './games/snake/modes';
import { getThemeNames } from './themes';
import { parseCliArgs } from './args';
import { loadHighScore, loadPreferences, recordScore } from './storage';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  dispose: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function createNodeTerminal(): NodeTerminal {
  const keyListeners: ((event: GameKeyEvent) => void)[] = [];
  const resizeListeners: ((size: { cols: number; rows: number }) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  function cleanup() {
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    const key = parseKey(data);
    const event: GameKeyEvent = {
      key: data,
      domEvent: {
        key,
        preventDefault: () => {},
        stopPropagation: () => {},
      },
    };
    for (const listener of [...keyListeners]) {
      listener(event);
    }
  });

  process.stdout.on('resize', () => {
    const size = { cols: process.stdout.columns || 80, rows: process.stdout.rows || 24 };
    for (const listener of [...resizeListeners]) {
      listener(size);
    }
  });

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  function subscribe<T>(list: T[], listener: T) {
    list.push(listener);
    return {
      dispose: () => {
        const idx = list.indexOf(listener);
        if (idx !== -1) list.splice(idx, 1);
      }
    };
  }

  const terminal: NodeTerminal = {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (listener) => subscribe(keyListeners, listener),
    onResize: (listener) => subscribe(resizeListeners, listener),
    dispose: cleanup,
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  snake-arcade — Snake in your terminal

  Usage:
    snake-arcade                       Mode select screen
    snake-arcade --mode <mode>         Jump straight into a mode
    snake-arcade setup                 Save default mode, difficulty, theme, sound
    snake-arcade --list-modes          List modes and difficulties
    snake-arcade --help                Show this help

  Options:
    -m, --mode <mode>                  ${MODE_ORDER.join(', ')}
    -d, --difficulty <level>           ${DIFFICULTY_ORDER.join(', ')}
    -t, --theme <theme>                ${getThemeNames().join(', ')}
    --sound / --no-sound               Terminal bell on eat and game over

  Controls:
    Arrow keys / WASD    Move / navigate
    Enter                Confirm / select
    ESC                  Pause menu
    R / M / Q            Restart / modes / quit (after a game)

  Examples:
    snake-arcade --mode zen
    snake-arcade -m time-trial -d hard --theme amber
`);
}

function printModes() {
  console.log('\n  Modes:');
  for (const mode of MODE_ORDER) {
    console.log(`    ${mode.padEnd(12)} ${MODES[mode].description}`);
  }
  console.log('\n  Difficulties:');
  for (const difficulty of DIFFICULTY_ORDER) {
    console.log(`    ${difficulty.padEnd(12)} ${DIFFICULTIES[difficulty].description}`);
  }
  console.log('');
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const prefs = loadPreferences();
  const options = parseCliArgs(process.argv.slice(2), prefs);

  switch (options.command) {
    case 'help':
      printHelp();
      return;
    case 'listModes':
      printModes();
      return;
    case 'setup': {
      const { setupCommand } = await import('./setup');
      await setupCommand();
      return;
    }
    case 'play':
      break;
  }

  setTheme(options.theme);
  const terminal = createNodeTerminal();
  await playBootTransition(terminal);

  const game = runSnakeGame(terminal, {
    mode: options.mode,
    difficulty: options.difficulty,
    sound: options.sound,
    skipModeSelect: options.skipModeSelect,
    highScore: loadHighScore(),
    onSessionEnd: (snap) => {
      recordScore(snap.score);
    },
  });

  windowPolyfill.addEventListener(GAME_EVENTS.QUIT, () => {
    playExitTransition(terminal)
      .catch((err: unknown) => console.error('[CLI] Exit transition failed:', err))
      .finally(() => {
        game.stop();
        terminal.dispose();
        process.exit(0);
      });
  });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error('[CLI] Fatal:', err);
  }
  process.exit(1);
});
