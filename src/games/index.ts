/**
 * Game front end exports
 */

export { runSnakeGame, directionForKey, type SnakeController, type SnakeGameOptions } from './snake';

export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
  type Disposable,
  type GameKeyEvent,
  type GameTerminal,
  type ThemeName,
} from './utils';

export {
  GAME_EVENTS,
  playBootTransition,
  playExitTransition,
  dispatchGameQuit,
  dispatchSessionEnd,
  type SessionEndDetail,
} from './gameTransitions';

export {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  PAUSE_MENU_ITEMS,
  type MenuKey,
  type PauseAction,
  type SimpleMenuItem,
} from './shared/menu';
