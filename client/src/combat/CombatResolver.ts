// ═══════════════════════════════════════════════════════════════════
// COMBAT RESOLVER — one incoming hit against one defender
//
// Decides, in a single synchronous call, what a landed hit does:
//
//   1. i-frames          → dodged, nothing applied
//   2. parry window open → perfect: parried, attacker staggered
//                          partial: damage / poise scaled down
//                          expired: falls through
//   3. guard up          → pays blockStaminaCostOnHit; if it can,
//                          damage × blockDamageFactor. If not, the
//                          guard breaks and the hit lands in full.
//   4. otherwise         → full damage
//
// Landed damage is reduced by physicalDefense, floored, and never
// drops below MIN_LANDED_DAMAGE. Poise goes in before health; a blow
// that both breaks poise and kills reports both but only kills.
//
// Event order per hit: parried, poiseBroken, healthChanged,
// damageApplied, death.
// ═══════════════════════════════════════════════════════════════════

import { MIN_LANDED_DAMAGE, evaluateTiming } from '@riposte/shared';
import type { Combatant } from './Combatant.js';
import type { CombatContext } from './CombatContext.js';
import { createDamageResult } from './DamageInfo.js';
import type { DamageInfo, DamageResult } from './DamageInfo.js';

export class CombatResolver {
  private readonly _ctx: CombatContext;

  constructor(ctx: CombatContext) {
    this._ctx = ctx;
  }

  /** Returns null when the defender is already dead: nothing happens. */
  resolve(info: DamageInfo, defender: Combatant): DamageResult | null {
    if (!defender.isAlive) return null;
    const events = this._ctx.events;
    const stats = defender.stats;

    // ── 1. I-frames ──────────────────────────────────────────────
    if (defender.isInvulnerable) {
      return this.finish(info, defender, createDamageResult({ dodged: true }));
    }

    let damageFactor = 1;
    let poiseFactor = 1;
    let partiallyParried = false;
    let blocked = false;

    // ── 2. Parry ─────────────────────────────────────────────────
    const window = defender.parryWindow;
    if (window && info.canBeParried) {
      const quality = evaluateTiming(window, this._ctx.clock.now());
      if (quality === 'perfect') {
        defender.stamina.tryConsume(0);
        events.emit('parried', { defender: defender.id, attacker: info.source?.id ?? null, quality });
        const result = this.finish(info, defender, createDamageResult({ parried: true }));
        const d = info.hitDirection;
        info.source?.applyStagger('heavy', { x: -d.x, y: -d.y, z: -d.z });
        return result;
      }
      if (quality === 'partial') {
        partiallyParried = true;
        damageFactor = stats.partialParryDamageFactor;
        poiseFactor = stats.partialParryPoiseFactor;
        events.emit('parried', { defender: defender.id, attacker: info.source?.id ?? null, quality });
      }
    }

    // ── 3. Block ─────────────────────────────────────────────────
    if (!partiallyParried && defender.isBlocking && defender.stamina.tryConsume(stats.blockStaminaCostOnHit)) {
      blocked = true;
      damageFactor = stats.blockDamageFactor;
    }

    // ── 4/5. Damage ──────────────────────────────────────────────
    const raw = info.amount * damageFactor * (1 - stats.physicalDefense);
    const finalDamage = Math.max(MIN_LANDED_DAMAGE, Math.floor(raw));
    const finalPoiseDamage = info.poiseDamage * poiseFactor;

    // ── 6. Poise ─────────────────────────────────────────────────
    const poiseBroken = defender.poise.applyPoiseDamage(finalPoiseDamage);
    if (poiseBroken) events.emit('poiseBroken', { actor: defender.id, source: info.source?.id ?? null });

    // ── 7. Health ────────────────────────────────────────────────
    const delta = defender.health.applyDamage(finalDamage);
    const causedDeath = defender.health.isDepleted;
    if (delta !== 0) {
      events.emit('healthChanged', {
        actor: defender.id,
        current: defender.health.current,
        max: defender.health.max,
        delta,
      });
    }

    const result = this.finish(info, defender, createDamageResult({
      finalDamage,
      finalPoiseDamage,
      partiallyParried,
      blocked,
      poiseBroken,
      causedDeath,
    }));

    // ── 8. Forced transitions ───────────────────────────────────
    if (causedDeath) defender.die(info.source);
    else if (poiseBroken) defender.applyStagger(info.staggerSeverity, info.hitDirection);
    return result;
  }

  private finish(info: DamageInfo, defender: Combatant, result: DamageResult): DamageResult {
    if (this._ctx.debug) {
      console.log(`[CombatResolver] ${info.source?.id ?? 'world'} -> ${defender.id}: ${describe(result)}`);
    }
    this._ctx.events.emit('damageApplied', { actor: defender.id, info, result });
    return result;
  }
}

function describe(result: DamageResult): string {
  if (result.dodged) return 'dodged';
  if (result.parried) return 'parried';
  const tags = [
    result.partiallyParried ? 'partial parry' : '',
    result.blocked ? 'blocked' : '',
    result.poiseBroken ? 'poise broken' : '',
    result.causedDeath ? 'killed' : '',
  ].filter(Boolean);
  return `${result.finalDamage} dmg${tags.length ? ` (${tags.join(', ')})` : ''}`;
}
