import { describe, it, expect } from 'vitest';
import { BASE_TRAITS, CONTOURS_FIELD, StateClass, VERTEX_TRAITS, fieldValuesEqual } from './state.js';
import { ColorClass } from './color.js';
import { VertexContoursClass } from './vertex-contours.js';

describe('StateClass', () => {
  it('merges the base fields under the given ones', () => {
    const state = new StateClass('box', { x: 5, label: 'a' });
    expect(state.fields).toEqual({ x: 5, y: 0, scale: 1, opacity: 1, rotation: 0, label: 'a' });
    expect(state.traits).toBe(BASE_TRAITS);
  });

  it('is immutable', () => {
    const state = new StateClass('box', { x: 5 });
    expect(Object.isFrozen(state.fields)).toBe(true);
  });

  it('with() keeps type, traits and meta', () => {
    const meta = { id: 'box-1' };
    const state = new StateClass('shape', { x: 1 }, VERTEX_TRAITS, meta);
    const moved = state.with({ x: 2 });
    expect(moved.get('x')).toBe(2);
    expect(state.get('x')).toBe(1);
    expect(moved.type).toBe('shape');
    expect(moved.traits).toBe(VERTEX_TRAITS);
    expect(moved.meta).toBe(meta);
  });

  it('reads typed values with fallbacks', () => {
    const state = new StateClass('box', { label: 'a', rotation: 30 });
    expect(state.getNumber('label', 7)).toBe(7);
    expect(state.rotation).toBe(30);
    expect(state.closed).toBe(true);
    expect(state.with({ closed: false }).closed).toBe(false);
    expect(state.getContours()).toBeNull();
  });

  it('exposes traits', () => {
    const state = new StateClass('shape', {}, VERTEX_TRAITS);
    expect(state.isAngle('rotation')).toBe(true);
    expect(state.isAngle('x')).toBe(false);
    expect(state.isNonInterpolatable('numVertices')).toBe(true);
    expect(state.isNonInterpolatable('x')).toBe(false);
    expect(state.defaultEasingFor('label')).toBeUndefined();
  });

  it('returns contours stored in the contours field', () => {
    const contours = VertexContoursClass.fromVertexLists([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 0 }]);
    const state = new StateClass('shape', { [CONTOURS_FIELD]: contours }, VERTEX_TRAITS);
    expect(state.getContours()).toBe(contours);
  });

  it('serializes colors as hex and contours as data', () => {
    const contours = VertexContoursClass.fromVertexLists([{ x: 0, y: 0 }, { x: 1, y: 0 }]);
    const state = new StateClass('shape', { fillColor: ColorClass.from('red'), [CONTOURS_FIELD]: contours });
    expect(state.toJSON()).toEqual({
      type: 'shape',
      x: 0,
      y: 0,
      scale: 1,
      opacity: 1,
      rotation: 0,
      fillColor: '#ff0000',
      contours: { outer: { vertices: [[0, 0], [1, 0]], closed: true }, holes: [] },
    });
  });
});

describe('fieldValuesEqual', () => {
  it('compares colors by channel and everything else by identity', () => {
    expect(fieldValuesEqual(new ColorClass(1, 2, 3), new ColorClass(1, 2, 3))).toBe(true);
    expect(fieldValuesEqual(ColorClass.NONE, new ColorClass(0, 0, 0, 0))).toBe(false);
    expect(fieldValuesEqual(1, 1)).toBe(true);
    expect(fieldValuesEqual(null, undefined)).toBe(false);
  });
});
