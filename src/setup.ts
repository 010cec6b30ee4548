/**
 * `snake-arcade setup` — interactive preferences editor, powered by
 * clack prompts.
 */

import * as p from '@clack/prompts';
import { DIFFICULTIES, DIFFICULTY_ORDER, MODES, MODE_ORDER } from './games/snake/modes';
import { getThemeNames, themes } from './themes';
import { getDataDir, loadPreferences, savePreferences, type Preferences } from './storage';

export async function setupCommand(dir: string = getDataDir()): Promise<void> {
  p.intro('snake-arcade setup');

  const current = loadPreferences(dir);

  const mode = await p.select({
    message: 'Default mode',
    initialValue: current.mode,
    options: MODE_ORDER.map(m => ({ value: m, label: MODES[m].name, hint: MODES[m].description })),
  });
  if (p.isCancel(mode)) {
    p.cancel('Cancelled.');
    return;
  }

  const difficulty = await p.select({
    message: 'Default difficulty',
    initialValue: current.difficulty,
    options: DIFFICULTY_ORDER.map(d => ({ value: d, label: DIFFICULTIES[d].name, hint: DIFFICULTIES[d].description })),
  });
  if (p.isCancel(difficulty)) {
    p.cancel('Cancelled.');
    return;
  }

  const theme = await p.select({
    message: 'Color theme',
    initialValue: current.theme,
    options: getThemeNames().map(t => ({ value: t, label: themes[t].name, hint: t })),
  });
  if (p.isCancel(theme)) {
    p.cancel('Cancelled.');
    return;
  }

  const sound = await p.confirm({
    message: 'Ring the terminal bell on eat and game over?',
    initialValue: current.sound,
  });
  if (p.isCancel(sound)) {
    p.cancel('Cancelled.');
    return;
  }

  const prefs: Preferences = { mode, difficulty, theme, sound };
  p.note(
    [
      `mode        ${MODES[mode].name}`,
      `difficulty  ${DIFFICULTIES[difficulty].name}`,
      `theme       ${themes[theme].name}`,
      `sound       ${sound ? 'on' : 'off'}`,
    ].join('\n'),
    'New preferences',
  );

  const confirmed = await p.confirm({ message: 'Save these preferences?' });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Nothing saved.');
    return;
  }

  if (savePreferences(prefs, dir)) {
    p.outro(`Saved to ${dir}`);
  } else {
    p.log.error('Could not save preferences.');
  }
}
