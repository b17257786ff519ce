// ═══════════════════════════════════════════════════════════════════
// COMBAT SYSTEM — actor registry + per-frame driver
//
// Owns every actor in one fight and the resolver they share. The host
// game loop calls, in order:
//
//   system.update(dt)        clock advances, each actor updates
//   system.fixedUpdate(dt)   physics hooks, external forces
//   system.processAttackOverlap(attacker, defender, hitPoint)
//                            for every hitbox overlap detected
//
// Overlaps resolve immediately, so a Stagger or Death they force is
// what the next update() sees.
//
// Hostility is by faction: different factions fight, the same faction
// never hurts itself.
// ═══════════════════════════════════════════════════════════════════

import type { ActorId, Faction, Vec3 } from '@riposte/shared';
import type { Combatant } from './Combatant.js';
import type { CombatContext } from './CombatContext.js';
import { CombatResolver } from './CombatResolver.js';
import { createDamageInfo } from './DamageInfo.js';
import type { DamageInfo, DamageResult } from './DamageInfo.js';

/** What the system drives; CombatActor of any state set qualifies */
export interface SystemActor extends Combatant {
  /** Damage scale of the current swing (heavy charge) */
  readonly swingDamageScale: number;
  update(dt: number): void;
  fixedUpdate(dt: number): void;
  /** False if `target` was already hit by the current swing */
  registerSwingHit(target: ActorId): boolean;
}

export class CombatSystem {
  readonly context: CombatContext;
  readonly resolver: CombatResolver;

  private readonly _actors = new Map<ActorId, SystemActor>();

  constructor(context: CombatContext) {
    this.context = context;
    this.resolver = new CombatResolver(context);
  }

  // ── Registry ────────────────────────────────────────────────────

  /** Returns false when the id is already taken */
  register(actor: SystemActor): boolean {
    if (this._actors.has(actor.id)) {
      console.warn(`[CombatSystem] Actor '${actor.id}' is already registered`);
      return false;
    }
    this._actors.set(actor.id, actor);
    if (this.context.debug) console.log(`[CombatSystem] Registered ${actor.id} (${actor.faction})`);
    return true;
  }

  unregister(id: ActorId): boolean {
    const removed = this._actors.delete(id);
    if (removed && this.context.debug) console.log(`[CombatSystem] Unregistered ${id}`);
    return removed;
  }

  get(id: ActorId): SystemActor | null {
    return this._actors.get(id) ?? null;
  }

  /** Snapshot in registration order */
  actors(): SystemActor[] {
    return Array.from(this._actors.values());
  }

  get count(): number { return this._actors.size; }

  /** Living actors of one faction */
  byFaction(faction: Faction): SystemActor[] {
    const result: SystemActor[] = [];
    for (const actor of this._actors.values()) {
      if (actor.faction === faction && actor.isAlive) result.push(actor);
    }
    return result;
  }

  // ── Relations ───────────────────────────────────────────────────

  areHostile(a: Combatant, b: Combatant): boolean {
    return a !== b && a.faction !== b.faction;
  }

  areAllies(a: Combatant, b: Combatant): boolean {
    return a === b || a.faction === b.faction;
  }

  /** Living hostiles of `from`, in registration order */
  hostilesOf(from: Combatant): SystemActor[] {
    const result: SystemActor[] = [];
    for (const actor of this._actors.values()) {
      if (actor.isAlive && this.areHostile(from, actor)) result.push(actor);
    }
    return result;
  }

  findNearestHostile(from: Combatant, maxDistance = Number.POSITIVE_INFINITY): SystemActor | null {
    let nearest: SystemActor | null = null;
    let nearestDistSq = maxDistance * maxDistance;
    for (const actor of this._actors.values()) {
      if (!actor.isAlive || !this.areHostile(from, actor)) continue;
      const distSq = from.position.distanceToSquared(actor.position);
      // Ties keep the earlier registration
      if (distSq < nearestDistSq || (nearest === null && distSq === nearestDistSq)) {
        nearest = actor;
        nearestDistSq = distSq;
      }
    }
    return nearest;
  }

  findHostilesInRadius(from: Combatant, radius: number): SystemActor[] {
    const radiusSq = radius * radius;
    const result: SystemActor[] = [];
    for (const actor of this._actors.values()) {
      if (!actor.isAlive || !this.areHostile(from, actor)) continue;
      if (from.position.distanceToSquared(actor.position) <= radiusSq) result.push(actor);
    }
    return result;
  }

  // ── Per-frame ───────────────────────────────────────────────────

  update(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      console.warn(`[CombatSystem] Ignored invalid frame step: ${dt}`);
      return;
    }
    this.context.clock.advance(dt);
    for (const actor of this._actors.values()) actor.update(dt);
  }

  fixedUpdate(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      console.warn(`[CombatSystem] Ignored invalid physics step: ${dt}`);
      return;
    }
    for (const actor of this._actors.values()) actor.fixedUpdate(dt);
  }

  // ── Hits ────────────────────────────────────────────────────────

  /**
   * Resolve a prepared hit. `attacker` is null for environmental damage.
   * Self hits, friendly fire and hits on the dead do nothing (null).
   */
  processHit(attacker: Combatant | null, defender: Combatant, info: DamageInfo): DamageResult | null {
    if (!defender.isAlive) return null;
    if (attacker) {
      if (attacker === defender || this.areAllies(attacker, defender)) return null;
    }
    return this.resolver.resolve(info, defender);
  }

  /**
   * Called by hit detection when the attacker's weapon overlaps the
   * defender. Builds the hit from the attacker's swing; each defender
   * is hit at most once per swing.
   */
  processAttackOverlap(attacker: SystemActor, defender: SystemActor, hitPoint: Vec3): DamageResult | null {
    const profile = attacker.activeAttack;
    if (!profile || !attacker.isHitboxActive || !attacker.isAlive) return null;
    if (!defender.isAlive || !this.areHostile(attacker, defender)) return null;
    if (!attacker.registerSwingHit(defender.id)) return null;

    const stats = attacker.stats;
    const kindMultiplier = profile.kind === 'heavy' ? stats.heavyAttackMultiplier : stats.lightAttackMultiplier;
    const a = attacker.position;
    const d = defender.position;

    const info = createDamageInfo({
      amount: stats.baseDamage * kindMultiplier * profile.damageMultiplier * attacker.swingDamageScale,
      poiseDamage: profile.poiseDamage,
      source: attacker,
      hitPoint,
      hitDirection: { x: d.x - a.x, y: d.y - a.y, z: d.z - a.z },
      canBeParried: profile.canBeParried,
      staggerSeverity: profile.staggerSeverity,
      timestamp: this.context.clock.now(),
    });
    if (!info) return null;
    return this.processHit(attacker, defender, info);
  }
}
