import { DECAY_CURVES, ExternalForces } from '../entities/ExternalForces.js';

const X = { x: 1, y: 0, z: 0 };
const Y = { x: 0, y: 1, z: 0 };

describe('ExternalForces', () => {
  let forces: ExternalForces;

  beforeEach(() => {
    forces = new ExternalForces();
  });

  it('applies an instant force for exactly one step', () => {
    expect(forces.addInstant({ x: 0, y: 3, z: 0 })).toBe(true);
    const sum = forces.tick(0.02);
    expect(sum.y).toBe(3);
    expect(forces.count).toBe(0);
    expect(forces.tick(0.02).y).toBe(0);
  });

  it('decays a knockback impulse along its curve', () => {
    // 3 units over 0.5 s → 12 u/s at the start
    forces.addKnockback({ x: 0, y: 0, z: 2 }, 3, 0.5);
    expect(forces.tick(0.25).z).toBe(12);
    // knockback(0.5) = 0.25 × 2 = 0.5
    expect(forces.tick(0.25).z).toBe(6);
    expect(forces.hasActiveForces).toBe(false);
  });

  it('holds continuous forces constant until they expire', () => {
    forces.addContinuous(X, 4, 1);
    expect(forces.tick(0.5).x).toBe(4);
    expect(forces.tick(0.5).x).toBe(4);
    expect(forces.count).toBe(0);
  });

  it('clamps magnitude and duration', () => {
    forces.addContinuous(X, 500, 50);
    expect(forces.tick(9.5).x).toBe(100);
    expect(forces.count).toBe(1);
    forces.tick(0.5);
    expect(forces.count).toBe(0);
  });

  it('ignores weak, directionless and zero-length forces', () => {
    expect(forces.addContinuous(X, 0.05, 1)).toBe(false);
    expect(forces.addContinuous({ x: 0, y: 0, z: 0 }, 5, 1)).toBe(false);
    expect(forces.addContinuous(X, 5, 0)).toBe(false);
    expect(forces.count).toBe(0);
  });

  it('rejects non-finite input with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(forces.addImpulse({ x: Number.NaN, y: 0, z: 0 }, 5, 1)).toBe(false);
    expect(forces.addImpulse(X, Number.POSITIVE_INFINITY, 1)).toBe(false);
    expect(warn).toHaveBeenCalledWith('[ExternalForces] Rejected impulse force: non-finite input');
    expect(forces.count).toBe(0);
    warn.mockRestore();
  });

  it('rejects a non-finite priority so eviction order stays intact', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const base = { kind: 'continuous' as const, direction: X, magnitude: 1, duration: 1 };
    expect(forces.addForce({ ...base, priority: Number.NaN })).toBe(false);
    expect(forces.addForce({ ...base, priority: Number.POSITIVE_INFINITY })).toBe(false);
    expect(warn).toHaveBeenCalledWith('[ExternalForces] Rejected continuous force: non-finite input');
    expect(forces.count).toBe(0);

    for (let i = 0; i < 8; i++) forces.addForce({ ...base, priority: 5 });
    expect(forces.addForce({ ...base, priority: -100 })).toBe(false);
    expect(forces.count).toBe(8);
    warn.mockRestore();
  });

  it('drops a ninth force that does not outrank any present', () => {
    for (let i = 0; i < 8; i++) forces.addContinuous(X, 1, 1);
    expect(forces.addContinuous(Y, 1, 1)).toBe(false);
    expect(forces.count).toBe(8);
    expect(forces.tick(0.5).y).toBe(0);
  });

  it('evicts the oldest weakest force for a higher-priority one', () => {
    forces.addImpulse(X, 2, 1);
    for (let i = 0; i < 7; i++) forces.addContinuous(X, 1, 1);
    expect(forces.addImpulse(Y, 5, 1)).toBe(true);
    expect(forces.count).toBe(8);

    // one continuous evicted: impulse 2 + six continuous along x, impulse 5 along y
    const sum = forces.tick(0.5);
    expect(sum.x).toBe(8);
    expect(sum.y).toBe(5);
  });

  it('clear drops everything', () => {
    forces.addContinuous(X, 1, 1);
    forces.addImpulse(Y, 1, 1);
    forces.clear();
    expect(forces.count).toBe(0);
    expect(forces.current.lengthSq()).toBe(0);
  });
});

describe('DECAY_CURVES', () => {
  it('start at full strength and end at zero', () => {
    for (const curve of Object.values(DECAY_CURVES)) {
      expect(curve(0)).toBe(1);
      expect(curve(1)).toBe(0);
    }
  });

  it('ease out faster than linear', () => {
    expect(DECAY_CURVES.easeOut(0.5)).toBe(0.25);
    expect(DECAY_CURVES.linear(0.5)).toBe(0.5);
  });
});
