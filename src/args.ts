/**
 * Command-line parsing for the snake-arcade CLI.
 *
 * Saved preferences fill in whatever the flags leave out. Bad names
 * throw ConfigError before the terminal is touched.
 */

import { ConfigError, parseDifficulty, parseGameMode } from './games/snake/modes';
import type { Difficulty, GameMode } from './games/snake/types';
import { getThemeNames, isValidThemeName, type ThemeName } from './themes';
import type { Preferences } from './storage';

export type CliCommand = 'play' | 'setup' | 'help' | 'listModes';

export interface CliOptions {
  command: CliCommand;
  mode: GameMode;
  difficulty: Difficulty;
  theme: ThemeName;
  sound: boolean;
  /** A mode was given on the command line: skip the select screen */
  skipModeSelect: boolean;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value;
}

export function parseTheme(name: string): ThemeName {
  if (isValidThemeName(name)) return name;
  throw new ConfigError(`Unknown theme "${name}". Expected one of: ${getThemeNames().join(', ')}`);
}

export function parseCliArgs(argv: string[], prefs: Preferences): CliOptions {
  const options: CliOptions = {
    command: 'play',
    mode: prefs.mode,
    difficulty: prefs.difficulty,
    theme: prefs.theme,
    sound: prefs.sound,
    skipModeSelect: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    // --flag=value form
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const inline = arg.startsWith('--') && eq !== -1 ? arg.slice(eq + 1) : null;
    const value = (): string => {
      if (inline !== null) return inline;
      const v = takeValue(argv, i, flag);
      i++;
      return v;
    };

    switch (flag) {
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      case '--list-modes':
        options.command = 'listModes';
        break;
      case '--mode':
      case '-m':
        options.mode = parseGameMode(value());
        options.skipModeSelect = true;
        break;
      case '--difficulty':
      case '-d':
        options.difficulty = parseDifficulty(value());
        break;
      case '--theme':
      case '-t':
        options.theme = parseTheme(value());
        break;
      case '--sound':
        options.sound = true;
        break;
      case '--no-sound':
        options.sound = false;
        break;
      case 'setup':
        if (i !== 0) throw new ConfigError('"setup" must be the first argument');
        options.command = 'setup';
        break;
      default:
        throw new ConfigError(`Unknown argument "${arg}". Run snake-arcade --help`);
    }
  }

  return options;
}
