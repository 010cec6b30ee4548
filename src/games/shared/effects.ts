/**
 * Shared Visual Effects
 *
 * Particles, score popups, screen shake and flashes. All of it is
 * cosmetic: the front end feeds engine events in and draws the result,
 * nothing here touches game state.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
  color: string;
}

export interface ScreenShakeState {
  frames: number;
  intensity: number;
}

export interface FlashState {
  frames: number;
}

/** Everything one game screen animates, advanced once per frame */
export interface EffectsState {
  particles: Particle[];
  popups: ScorePopup[];
  shake: ScreenShakeState;
  /** Border strobe on death */
  deathFlash: FlashState;
  /** Snake/score highlight after eating */
  eatFlash: FlashState;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_PARTICLES = 100;

export const PARTICLE_CHARS = {
  success: ['✦', '★', '◆', '♦'],
  death: ['✗', '☠', '×', '▒'],
  power: ['✧', '✦', '◇', '○'],
  firework: ['★', '✦', '◆', '●', '✶', '✴', '◇', '♦', '•', '○'],
} as const;

export const FIREWORK_COLORS = [
  '\x1b[1;93m', '\x1b[1;92m', '\x1b[1;96m',
  '\x1b[1;95m', '\x1b[1;91m', '\x1b[1;97m',
];

export function createEffects(): EffectsState {
  return {
    particles: [],
    popups: [],
    shake: { frames: 0, intensity: 0 },
    deathFlash: { frames: 0 },
    eatFlash: { frames: 0 },
  };
}

export function clearEffects(effects: EffectsState): void {
  effects.particles.length = 0;
  effects.popups.length = 0;
  effects.shake.frames = 0;
  effects.deathFlash.frames = 0;
  effects.eatFlash.frames = 0;
}

/**
 * Advance every effect by one frame.
 */
export function updateEffects(effects: EffectsState): void {
  updateParticles(effects.particles);
  updatePopups(effects.popups);
  if (effects.deathFlash.frames > 0) effects.deathFlash.frames--;
  if (effects.eatFlash.frames > 0) effects.eatFlash.frames--;
}

// ============================================================================
// PARTICLES
// ============================================================================

/**
 * Radial burst, capped at MAX_PARTICLES live particles.
 */
export function spawnParticles(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  color: string,
  chars: readonly string[] = PARTICLE_CHARS.success,
): void {
  if (particles.length >= MAX_PARTICLES) return;

  const actualCount = Math.min(count, MAX_PARTICLES - particles.length);
  for (let i = 0; i < actualCount; i++) {
    const angle = (Math.PI * 2 * i) / count + Math.random() * 0.5;
    const speed = 0.3 + Math.random() * 0.4;
    particles.push({
      x,
      y,
      char: chars[Math.floor(Math.random() * chars.length)],
      color,
      vx: Math.cos(angle) * speed,
      // Terminal cells are twice as tall as wide
      vy: Math.sin(angle) * speed * 0.5,
      life: 15 + Math.floor(Math.random() * 10),
    });
  }
}

/**
 * Multicolor burst for a completed maze.
 */
export function spawnFirework(particles: Particle[], x: number, y: number): void {
  const chars = PARTICLE_CHARS.firework;
  const count = Math.min(16, MAX_PARTICLES - particles.length);
  for (let i = 0; i < count; i++) {
    const angle = (Math.PI * 2 * i) / count;
    const speed = 0.4 + Math.random() * 0.4;
    particles.push({
      x,
      y,
      char: chars[Math.floor(Math.random() * chars.length)],
      color: FIREWORK_COLORS[Math.floor(Math.random() * FIREWORK_COLORS.length)],
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed - 0.2,
      life: 20 + Math.floor(Math.random() * 15),
    });
  }
}

export function updateParticles(particles: Particle[]): void {
  for (let i = particles.length - 1; i >= 0; i--) {
    const p = particles[i];
    p.x += p.vx;
    p.y += p.vy;
    p.vy += 0.05; // gravity
    p.life--;
    if (p.life <= 0) particles.splice(i, 1);
  }
}

// ============================================================================
// SCORE POPUPS
// ============================================================================

export function addScorePopup(
  popups: ScorePopup[],
  x: number,
  y: number,
  text: string,
  color: string = '\x1b[1;33m',
): void {
  popups.push({ x, y, text, frames: 20, color });
}

/**
 * Float popups upward and drop expired ones.
 */
export function updatePopups(popups: ScorePopup[]): void {
  for (let i = popups.length - 1; i >= 0; i--) {
    const popup = popups[i];
    popup.y -= 0.3;
    popup.frames--;
    if (popup.frames <= 0) popups.splice(i, 1);
  }
}

// ============================================================================
// SCREEN SHAKE
// ============================================================================

/**
 * Intensity guide: 1 eating, 2 power-up, 3 death.
 */
export function triggerShake(state: ScreenShakeState, frames: number, intensity: number): void {
  state.frames = frames;
  state.intensity = intensity;
}

/**
 * Offset to add to the render origin this frame. Consumes one shake frame.
 */
export function applyShake(state: ScreenShakeState): { offsetX: number; offsetY: number } {
  if (state.frames > 0) {
    state.frames--;
    return {
      offsetX: Math.floor((Math.random() - 0.5) * state.intensity * 2),
      offsetY: Math.floor((Math.random() - 0.5) * state.intensity),
    };
  }
  return { offsetX: 0, offsetY: 0 };
}

// ============================================================================
// FLASH EFFECTS
// ============================================================================

export function triggerFlash(state: FlashState, frames: number): void {
  state.frames = frames;
}

export function isFlashActive(state: FlashState): boolean {
  return state.frames > 0;
}

/**
 * Strobe: visible two frames out of every four.
 */
export function isFlashVisible(state: FlashState): boolean {
  return state.frames > 0 && state.frames % 4 < 2;
}
