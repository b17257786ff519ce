import { CombatEvents } from '../combat/CombatEvents.js';
import type { HealthChangedEvent } from '../combat/CombatEvents.js';
import {
  createDamageInfo, createDamageResult, noDamageTaken, wasDefended,
} from '../combat/DamageInfo.js';

describe('CombatEvents', () => {
  const payload: HealthChangedEvent = { actor: 'a', current: 5, max: 10, delta: -5 };

  it('delivers to every listener of the event in subscription order', () => {
    const events = new CombatEvents();
    const seen: string[] = [];
    events.on('healthChanged', () => seen.push('first'));
    events.on('healthChanged', (e) => seen.push(`second:${e.delta}`));
    events.on('death', () => seen.push('death'));

    events.emit('healthChanged', payload);
    expect(seen).toEqual(['first', 'second:-5']);
  });

  it('unsubscribes through the returned function', () => {
    const events = new CombatEvents();
    const handler = jest.fn();
    const off = events.on('healthChanged', handler);
    off();
    events.emit('healthChanged', payload);
    expect(handler).not.toHaveBeenCalled();
    expect(events.listenerCount('healthChanged')).toBe(0);
  });

  it('lets a listener remove itself mid-dispatch without skipping others', () => {
    const events = new CombatEvents();
    const later = jest.fn();
    const off = events.on('healthChanged', () => off());
    events.on('healthChanged', later);

    events.emit('healthChanged', payload);
    expect(later).toHaveBeenCalledTimes(1);
    expect(events.listenerCount('healthChanged')).toBe(1);
  });

  it('clear removes listeners of every event', () => {
    const events = new CombatEvents();
    events.on('death', jest.fn());
    events.on('parried', jest.fn());
    events.clear();
    expect(events.listenerCount('death')).toBe(0);
    expect(events.listenerCount('parried')).toBe(0);
  });
});

describe('createDamageInfo', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('fills defaults and normalizes the hit direction', () => {
    const info = createDamageInfo({ amount: 12, timestamp: 1, hitDirection: { x: 0, y: 0, z: -4 } });
    expect(info).toEqual({
      amount: 12,
      poiseDamage: 0,
      type: 'physical',
      source: null,
      hitPoint: { x: 0, y: 0, z: 0 },
      hitDirection: { x: 0, y: 0, z: -1 },
      canBeParried: true,
      staggerSeverity: 'heavy',
      timestamp: 1,
    });
    expect(Object.isFrozen(info)).toBe(true);
  });

  it('rejects zero, negative and non-finite amounts', () => {
    expect(createDamageInfo({ amount: 0, timestamp: 0 })).toBeNull();
    expect(createDamageInfo({ amount: -3, timestamp: 0 })).toBeNull();
    expect(createDamageInfo({ amount: Number.NaN, timestamp: 0 })).toBeNull();
    expect(warn).toHaveBeenCalledWith('[DamageInfo] Rejected damage amount: -3');
  });

  it('rejects a non-finite hit point', () => {
    expect(createDamageInfo({ amount: 5, timestamp: 0, hitPoint: { x: 0, y: Number.POSITIVE_INFINITY, z: 0 } }))
      .toBeNull();
    expect(warn).toHaveBeenCalledWith('[DamageInfo] Rejected hit: non-finite input');
  });

  it('clamps negative poise damage to zero', () => {
    expect(createDamageInfo({ amount: 5, poiseDamage: -10, timestamp: 0 })?.poiseDamage).toBe(0);
  });
});

describe('DamageResult helpers', () => {
  it('classify defended and undamaged results', () => {
    const blocked = createDamageResult({ blocked: true, finalDamage: 3 });
    expect(wasDefended(blocked)).toBe(true);
    expect(noDamageTaken(blocked)).toBe(false);

    const dodged = createDamageResult({ dodged: true });
    expect(noDamageTaken(dodged)).toBe(true);
    expect(wasDefended(createDamageResult({ finalDamage: 9 }))).toBe(false);
    expect(wasDefended(createDamageResult({ partiallyParried: true, finalDamage: 4 }))).toBe(false);
  });
});
