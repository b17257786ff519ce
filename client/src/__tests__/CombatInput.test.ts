import * as THREE from 'three';
import {
  ENEMY_ATTACK_PATTERN, HEAVY_ATTACK, LIGHT_COMBO, isHitboxActive, isInComboWindow,
} from '../combat/AttackData.js';
import { CombatInput } from '../combat/CombatInput.js';
import { NO_PERCEPTION, TrackedPerception, targetWithin } from '../combat/EnemyPerception.js';
import { createCombatContext, player } from './fixtures.js';

describe('CombatInput', () => {
  it('normalizes stick input longer than 1 and keeps shorter input', () => {
    const input = new CombatInput();
    input.setDirection({ x: 3, y: 4 });
    expect(input.direction.x).toBeCloseTo(0.6);
    expect(input.direction.y).toBeCloseTo(0.8);

    input.setDirection({ x: 0.5, y: 0 });
    expect(input.direction.x).toBe(0.5);
    expect(input.hasDirection).toBe(true);
  });

  it('treats tiny deflection as no input', () => {
    const input = new CombatInput();
    input.setDirection({ x: 0.05, y: 0.05 });
    expect(input.hasDirection).toBe(false);
  });

  it('rejects a non-finite direction', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const input = new CombatInput();
    input.setDirection({ x: 1, y: 0 });
    input.setDirection({ x: Number.NaN, y: 0 });
    expect(input.direction.x).toBe(1);
    expect(warn).toHaveBeenCalledWith('[CombatInput] Rejected non-finite direction');
    warn.mockRestore();
  });

  it('derives press and release edges, cleared at the end of the frame', () => {
    const input = new CombatInput();
    input.setHeld('attack', true);
    expect(input.actions.attack.justPressed).toBe(true);
    input.endFrame();
    expect(input.actions.attack.justPressed).toBe(false);
    expect(input.isHeld('attack')).toBe(true);

    input.setHeld('attack', false);
    expect(input.actions.attack.justReleased).toBe(true);
  });
});

describe('EnemyPerception', () => {
  it('never sees anything by default', () => {
    expect(targetWithin(NO_PERCEPTION, 1000)).toBe(false);
  });

  it('measures distance from positions each read', () => {
    const ctx = createCombatContext();
    const hero = player(ctx);
    const perception = new TrackedPerception({ position: new THREE.Vector3(0, 0, 4) });
    expect(perception.distanceToTarget).toBe(Number.POSITIVE_INFINITY);

    perception.target = hero;
    expect(perception.distanceToTarget).toBe(4);
    expect(targetWithin(perception, perception.attackRange)).toBe(false);

    hero.position.set(0, 0, 3);
    expect(targetWithin(perception, perception.attackRange)).toBe(true);
  });
});

describe('attack profiles', () => {
  it('chain three light swings, the last of which cannot combo', () => {
    expect(LIGHT_COMBO.map((p) => p.canCombo)).toEqual([true, true, false]);
    expect(isInComboWindow(LIGHT_COMBO[0], 0.5)).toBe(true);
    expect(isInComboWindow(LIGHT_COMBO[0], 0.875)).toBe(false);
    expect(isInComboWindow(LIGHT_COMBO[2], 0.625)).toBe(false);
  });

  it('open the hitbox only inside the active frames', () => {
    expect(isHitboxActive(HEAVY_ATTACK, 0.25)).toBe(false);
    expect(isHitboxActive(HEAVY_ATTACK, 0.375)).toBe(true);
    expect(isHitboxActive(HEAVY_ATTACK, 0.5)).toBe(true);
    expect(isHitboxActive(HEAVY_ATTACK, 0.625)).toBe(false);
  });

  it('give the heavy swing super armor and the enemy swings their own timing', () => {
    expect(HEAVY_ATTACK.hasSuperArmor).toBe(true);
    expect(ENEMY_ATTACK_PATTERN.map((p) => p.name)).toEqual(['enemyAttack1', 'enemyAttack2']);
    expect(ENEMY_ATTACK_PATTERN[0].duration).toBe(1.2);
  });
});
