import { SimulationClock } from '@riposte/shared';
import { HealthPool } from '../combat/HealthPool.js';
import { PoiseLedger } from '../combat/PoiseLedger.js';
import { StaminaLedger } from '../combat/StaminaLedger.js';

describe('PoiseLedger', () => {
  let clock: SimulationClock;
  let poise: PoiseLedger;

  beforeEach(() => {
    clock = new SimulationClock();
    poise = new PoiseLedger(clock, { max: 100, regenRate: 10, regenDelay: 2 });
  });

  it('breaks once when hits sum exactly to max, then restarts at zero', () => {
    expect(poise.applyPoiseDamage(40)).toBe(false);
    expect(poise.applyPoiseDamage(60)).toBe(true);
    expect(poise.current).toBe(0);
    expect(poise.breakCount).toBe(1);

    expect(poise.applyPoiseDamage(40)).toBe(false);
    expect(poise.current).toBe(40);
  });

  it('discards overflow on break', () => {
    poise.applyPoiseDamage(90);
    expect(poise.applyPoiseDamage(40)).toBe(true);
    expect(poise.current).toBe(0);
  });

  it('never goes negative', () => {
    poise.applyPoiseDamage(-25);
    expect(poise.current).toBe(0);
  });

  it('rejects non-finite damage without recording a hit', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(poise.applyPoiseDamage(Number.POSITIVE_INFINITY)).toBe(false);
    expect(poise.current).toBe(0);
    expect(poise.lastHitTime).toBe(Number.NEGATIVE_INFINITY);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('drains only after the regen delay since the last hit', () => {
    poise.applyPoiseDamage(50);
    clock.advance(1);
    poise.tick(1);
    expect(poise.current).toBe(50);

    clock.advance(1);
    poise.tick(1);
    expect(poise.current).toBe(40);
  });

  it('predicts a break without applying it', () => {
    poise.applyPoiseDamage(75);
    expect(poise.wouldBreak(25)).toBe(true);
    expect(poise.wouldBreak(24)).toBe(false);
    expect(poise.current).toBe(75);
    expect(poise.remaining).toBe(25);
    expect(poise.normalized).toBe(0.75);
  });
});

describe('StaminaLedger', () => {
  let stamina: StaminaLedger;

  beforeEach(() => {
    stamina = new StaminaLedger({ max: 100, regenRate: 20, regenDelay: 1 });
  });

  it('restores up to max without touching the regen delay', () => {
    stamina.tryConsume(50);
    stamina.restore(30);
    expect(stamina.current).toBe(80);
    expect(stamina.regenDelayRemaining).toBe(1);
    stamina.restore(100);
    expect(stamina.current).toBe(100);
  });

  it('leaves stamina unchanged when a cost is unaffordable', () => {
    stamina.tryConsume(80);
    expect(stamina.tryConsume(30)).toBe(false);
    expect(stamina.current).toBe(20);
  });

  it('deducts exactly and restarts the regen delay', () => {
    expect(stamina.tryConsume(25)).toBe(true);
    expect(stamina.current).toBe(75);
    expect(stamina.regenDelayRemaining).toBe(1);
  });

  it('always accepts a zero cost, which still resets the delay', () => {
    stamina.tryConsume(0);
    expect(stamina.current).toBe(100);
    expect(stamina.regenDelayRemaining).toBe(1);
  });

  it('rejects negative and non-finite costs', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(stamina.tryConsume(-5)).toBe(false);
    expect(stamina.tryConsume(Number.NaN)).toBe(false);
    expect(stamina.current).toBe(100);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('regenerates only with the time left after the delay', () => {
    stamina.tryConsume(50);
    stamina.tick(0.5);
    expect(stamina.current).toBe(50);
    stamina.tick(1);
    expect(stamina.current).toBe(60);
    expect(stamina.regenDelayRemaining).toBe(0);
  });

  it('clamps regeneration at max', () => {
    stamina.tryConsume(10);
    stamina.tick(5);
    expect(stamina.current).toBe(100);
  });

  it('exhausts on draining to zero and recovers at the threshold', () => {
    stamina.tryConsume(90);
    expect(stamina.drain(20, 0.5)).toBe(false);
    expect(stamina.current).toBe(0);
    expect(stamina.isExhausted).toBe(true);
    expect(stamina.drain(1, 0.5)).toBe(false);

    // delay 1 s, then 20/s: 1.5 s gives 10, below the 20 threshold
    stamina.tick(1.5);
    expect(stamina.current).toBe(10);
    expect(stamina.isExhausted).toBe(true);

    stamina.tick(0.5);
    expect(stamina.current).toBe(20);
    expect(stamina.isExhausted).toBe(false);
  });

  it('reset refills and clears exhaustion', () => {
    stamina.drain(1000, 1);
    stamina.reset();
    expect(stamina.current).toBe(100);
    expect(stamina.isExhausted).toBe(false);
    expect(stamina.regenDelayRemaining).toBe(0);
  });
});

describe('HealthPool', () => {
  it('reports the signed change and floors at zero', () => {
    const health = new HealthPool(10);
    expect(health.applyDamage(4)).toBe(-4);
    expect(health.applyDamage(20)).toBe(-6);
    expect(health.current).toBe(0);
    expect(health.isDepleted).toBe(true);
  });

  it('ignores non-positive damage', () => {
    const health = new HealthPool(10);
    expect(health.applyDamage(0)).toBe(0);
    expect(health.applyDamage(-3)).toBe(0);
    expect(health.current).toBe(10);
  });

  it('rejects non-finite amounts with a warning', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const health = new HealthPool(10);
    expect(health.applyDamage(Number.NaN)).toBe(0);
    expect(warn).toHaveBeenCalledWith('[HealthPool] Rejected non-finite damage: NaN');
    health.applyDamage(4);
    expect(health.heal(Number.POSITIVE_INFINITY)).toBe(0);
    expect(warn).toHaveBeenCalledWith('[HealthPool] Rejected non-finite heal: Infinity');
    expect(health.current).toBe(6);
    warn.mockRestore();
  });

  it('heals up to max but never revives', () => {
    const health = new HealthPool(10);
    health.applyDamage(5);
    expect(health.heal(8)).toBe(5);
    expect(health.normalized).toBe(1);

    health.applyDamage(10);
    expect(health.heal(5)).toBe(0);
    expect(health.isDepleted).toBe(true);
  });
});
