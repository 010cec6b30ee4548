import { describe, it, expect } from 'vitest';
import {
  MAX_PARTICLES,
  addScorePopup,
  applyShake,
  clearEffects,
  createEffects,
  isFlashVisible,
  spawnFirework,
  spawnParticles,
  triggerFlash,
  triggerShake,
  updateEffects,
  updateParticles,
  updatePopups,
  type Particle,
  type ScorePopup,
} from './effects';

describe('particles', () => {
  it('spawns the requested count at the origin', () => {
    const particles: Particle[] = [];
    spawnParticles(particles, 4, 2, 6, '\x1b[33m');
    expect(particles).toHaveLength(6);
    for (const p of particles) {
      expect(p.x).toBe(4);
      expect(p.y).toBe(2);
      expect(p.color).toBe('\x1b[33m');
    }
  });

  it('never exceeds MAX_PARTICLES', () => {
    const particles: Particle[] = [];
    spawnParticles(particles, 0, 0, MAX_PARTICLES - 3, '');
    spawnParticles(particles, 0, 0, 10, '');
    expect(particles).toHaveLength(MAX_PARTICLES);
    spawnFirework(particles, 0, 0);
    expect(particles).toHaveLength(MAX_PARTICLES);
  });

  it('moves particles and removes dead ones', () => {
    const particles: Particle[] = [
      { x: 0, y: 0, char: '*', color: '', vx: 1, vy: 0, life: 1 },
      { x: 0, y: 0, char: '*', color: '', vx: 1, vy: 0, life: 5 },
    ];
    updateParticles(particles);
    expect(particles).toHaveLength(1);
    expect(particles[0].x).toBe(1);
    expect(particles[0].life).toBe(4);
    expect(particles[0].vy).toBeCloseTo(0.05);
  });
});

describe('popups', () => {
  it('float upward and expire after 20 frames', () => {
    const popups: ScorePopup[] = [];
    addScorePopup(popups, 3, 10, '+10');
    updatePopups(popups);
    expect(popups[0].y).toBeCloseTo(9.7);
    for (let i = 0; i < 19; i++) updatePopups(popups);
    expect(popups).toHaveLength(0);
  });
});

describe('screen shake', () => {
  it('returns zero offset when idle', () => {
    expect(applyShake({ frames: 0, intensity: 3 })).toEqual({ offsetX: 0, offsetY: 0 });
  });

  it('consumes one frame per call', () => {
    const shake = { frames: 0, intensity: 0 };
    triggerShake(shake, 2, 1);
    applyShake(shake);
    applyShake(shake);
    expect(shake.frames).toBe(0);
  });
});

describe('flash', () => {
  it('strobes two frames on, two off', () => {
    const flash = { frames: 0 };
    triggerFlash(flash, 5);
    const seen: boolean[] = [];
    const effects = createEffects();
    effects.deathFlash = flash;
    for (let i = 0; i < 5; i++) {
      seen.push(isFlashVisible(flash));
      updateEffects(effects);
    }
    // frames 5,4,3,2,1 -> %4 = 1,0,3,2,1
    expect(seen).toEqual([true, true, false, false, true]);
  });
});

describe('clearEffects', () => {
  it('resets everything', () => {
    const effects = createEffects();
    spawnParticles(effects.particles, 0, 0, 4, '');
    addScorePopup(effects.popups, 0, 0, '+1');
    triggerShake(effects.shake, 10, 2);
    triggerFlash(effects.eatFlash, 8);
    clearEffects(effects);
    expect(effects.particles).toHaveLength(0);
    expect(effects.popups).toHaveLength(0);
    expect(effects.shake.frames).toBe(0);
    expect(effects.eatFlash.frames).toBe(0);
  });
});
