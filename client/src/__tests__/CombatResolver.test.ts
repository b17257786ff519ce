import { CombatResolver } from '../combat/CombatResolver.js';
import type { CombatContext } from '../combat/CombatContext.js';
import type { ParriedEvent } from '../combat/CombatEvents.js';
import type { EnemyActor } from '../combat/states/EnemyStates.js';
import type { PlayerActor } from '../combat/states/PlayerStates.js';
import { createCombatContext, enemy, hit, player, recordEvents } from './fixtures.js';

describe('CombatResolver', () => {
  let ctx: CombatContext;
  let resolver: CombatResolver;
  let attacker: EnemyActor;
  let defender: PlayerActor;

  beforeEach(() => {
    ctx = createCombatContext();
    resolver = new CombatResolver(ctx);
    attacker = enemy(ctx);
    defender = player(ctx, { physicalDefense: 0 });
  });

  function strike(amount = 20, poiseDamage = 10, canBeParried = true) {
    return resolver.resolve(hit({
      amount, poiseDamage, canBeParried, source: attacker, hitDirection: { x: 0, y: 0, z: 1 },
    }), defender);
  }

  it('lands full damage and poise on an undefended hit', () => {
    const events = recordEvents(ctx);
    const result = strike();

    expect(result).toEqual({
      finalDamage: 20,
      finalPoiseDamage: 10,
      parried: false,
      partiallyParried: false,
      dodged: false,
      blocked: false,
      poiseBroken: false,
      causedDeath: false,
    });
    expect(defender.health.current).toBe(80);
    expect(defender.poise.current).toBe(10);
    expect(events).toEqual(['healthChanged', 'damageApplied']);
  });

  it('reduces by physical defense, floors, and never lands less than 1', () => {
    defender = player(ctx, { physicalDefense: 0.5 });
    expect(strike(15)?.finalDamage).toBe(7);
    expect(strike(1)?.finalDamage).toBe(1);
    expect(defender.health.current).toBe(92);
  });

  it('nullifies a hit during i-frames', () => {
    defender.setInvulnerable(true);
    const events = recordEvents(ctx);
    const result = strike();

    expect(result?.dodged).toBe(true);
    expect(result?.finalDamage).toBe(0);
    expect(defender.health.current).toBe(100);
    expect(defender.poise.current).toBe(0);
    expect(events).toEqual(['damageApplied']);
  });

  describe('parry', () => {
    beforeEach(() => {
      // player preset: 0.2 s window, first 0.1 s perfect
      defender.openParryWindow(0.2, 0.1);
    });

    it('perfect timing takes nothing and staggers the attacker', () => {
      const parried: ParriedEvent[] = [];
      ctx.events.on('parried', (e) => parried.push(e));
      ctx.clock.advance(0.0625);
      const result = strike();

      expect(result?.parried).toBe(true);
      expect(result?.finalDamage).toBe(0);
      expect(defender.health.current).toBe(100);
      expect(defender.poise.current).toBe(0);
      expect(defender.stamina.regenDelayRemaining).toBe(0.8);
      expect(parried).toEqual([{ defender: 'hero', attacker: 'grunt', quality: 'perfect' }]);
      expect(attacker.stateId).toBe('stagger');
      expect(attacker.staggerSeverity).toBe('heavy');
      expect(attacker.staggerDirection.z).toBe(-1);
    });

    it('partial timing scales damage and poise down', () => {
      ctx.clock.advance(0.15);
      const result = strike(20, 10);

      expect(result?.partiallyParried).toBe(true);
      expect(result?.finalDamage).toBe(10);
      expect(result?.finalPoiseDamage).toBe(5);
      expect(attacker.stateId).toBe('idle');
    });

    it('partial parry takes precedence over a raised guard', () => {
      defender.setBlocking(true);
      ctx.clock.advance(0.15);
      const result = strike();

      expect(result?.blocked).toBe(false);
      expect(defender.stamina.current).toBe(100);
    });

    it('an expired window falls through to a full hit', () => {
      ctx.clock.advance(0.25);
      expect(strike()?.finalDamage).toBe(20);
    });

    it('does not apply to unparryable hits', () => {
      ctx.clock.advance(0.0625);
      const result = strike(20, 10, false);
      expect(result?.parried).toBe(false);
      expect(result?.finalDamage).toBe(20);
    });
  });

  describe('block', () => {
    it('pays stamina, halves damage and keeps full poise damage', () => {
      defender.setBlocking(true);
      const result = strike(20, 10);

      expect(result?.blocked).toBe(true);
      expect(result?.finalDamage).toBe(10);
      expect(result?.finalPoiseDamage).toBe(10);
      expect(defender.stamina.current).toBe(85);
    });

    it('lets the hit through when the guard cannot be paid for', () => {
      defender.setBlocking(true);
      defender.stamina.tryConsume(90);
      const result = strike();

      expect(result?.blocked).toBe(false);
      expect(result?.finalDamage).toBe(20);
      expect(defender.stamina.current).toBe(10);
    });
  });

  it('staggers on poise break with the hit severity', () => {
    const events = recordEvents(ctx);
    const result = resolver.resolve(hit({
      amount: 5, poiseDamage: 50, staggerSeverity: 'medium', source: attacker,
    }), defender);

    expect(result?.poiseBroken).toBe(true);
    expect(defender.stateId).toBe('stagger');
    expect(defender.staggerSeverity).toBe('medium');
    expect(events).toEqual(['poiseBroken', 'healthChanged', 'damageApplied', 'stateChanged']);
  });

  it('reports both flags on a killing blow that breaks poise, but only kills', () => {
    defender = player(ctx, { physicalDefense: 0, maxHealth: 10 });
    const events = recordEvents(ctx);
    const result = strike(20, 50);

    expect(result?.poiseBroken).toBe(true);
    expect(result?.causedDeath).toBe(true);
    expect(defender.isAlive).toBe(false);
    expect(defender.stateId).toBe('death');
    expect(events).toEqual(['poiseBroken', 'healthChanged', 'damageApplied', 'stateChanged', 'death']);
  });

  it('does nothing to a dead defender', () => {
    defender.die(null);
    const events = recordEvents(ctx);
    expect(strike()).toBeNull();
    expect(events).toEqual([]);
  });
});
