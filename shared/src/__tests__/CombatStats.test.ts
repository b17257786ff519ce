import {
  STAT_PRESETS,
  parseCombatStats,
  resolveCombatStats,
} from '../CombatStats.js';
import { CombatConfigError } from '../errors.js';

describe('STAT_PRESETS', () => {
  it('loads both presets from data', () => {
    expect(STAT_PRESETS.player.maxHealth).toBe(100);
    expect(STAT_PRESETS.enemy.maxHealth).toBe(50);
  });

  it('freezes presets', () => {
    expect(Object.isFrozen(STAT_PRESETS.player)).toBe(true);
  });
});

describe('parseCombatStats', () => {
  it('accepts a valid stat block', () => {
    const stats = parseCombatStats({ ...STAT_PRESETS.player });
    expect(stats.maxPoise).toBe(50);
  });

  it('throws a config error naming the offending field', () => {
    let caught: unknown;
    try {
      parseCombatStats({ ...STAT_PRESETS.player, maxHealth: -5 }, 'knight');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CombatConfigError);
    if (caught instanceof CombatConfigError) {
      expect(caught.code).toBe('invalid-stats');
      expect(caught.message).toContain('Invalid knight:');
      expect(caught.message).toContain('maxHealth:');
    }
  });

  it('rejects a perfect parry window longer than the parry window', () => {
    expect(() => parseCombatStats({
      ...STAT_PRESETS.player,
      parryWindowDuration: 0.1,
      perfectParryWindow: 0.2,
    })).toThrow(/perfectParryWindow must not exceed parryWindowDuration/);
  });

  it('rejects i-frames that end before they start', () => {
    expect(() => parseCombatStats({
      ...STAT_PRESETS.player,
      dodgeIFrameStart: 0.5,
      dodgeIFrameEnd: 0.25,
    })).toThrow(CombatConfigError);
  });

  it('rejects non-object input', () => {
    expect(() => parseCombatStats('strong')).toThrow(CombatConfigError);
  });

  it('rejects non-finite numbers', () => {
    expect(() => parseCombatStats({ ...STAT_PRESETS.player, moveSpeed: Number.NaN })).toThrow(/moveSpeed/);
  });
});

describe('resolveCombatStats', () => {
  it('merges overrides over the preset', () => {
    const stats = resolveCombatStats('enemy', { maxHealth: 80 });
    expect(stats.maxHealth).toBe(80);
    expect(stats.maxPoise).toBe(STAT_PRESETS.enemy.maxPoise);
  });

  it('validates the merged result', () => {
    expect(() => resolveCombatStats('player', { blockDamageFactor: 2 })).toThrow(/player stats/);
  });
});
