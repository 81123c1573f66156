import { ColorClass } from './color.js';
import { VertexContoursClass } from './vertex-contours.js';
import { type EasingFunction, type EasingTable, inOut, linear, step } from '../interpolation/easing.js';

/**
 * Values a state field can hold.
 */
export type FieldValue = number | string | boolean | null | ColorClass | VertexContoursClass;

export type StateFields = Readonly<Record<string, FieldValue>>;

/**
 * Per-type interpolation metadata, shared by every state of that type.
 */
export interface StateTraits {
  /** Fields interpolated along the shortest arc */
  readonly angleFields: ReadonlySet<string>;
  /** Fields that switch at the halfway point and never blend */
  readonly nonInterpolatableFields: ReadonlySet<string>;
  /** Easing used when no override applies */
  readonly defaultEasing: EasingTable;
}

/** Field holding the precomputed vertex geometry of vertex-based states. */
export const CONTOURS_FIELD = 'contours';

export const BASE_FIELDS: StateFields = {
  x: 0,
  y: 0,
  scale: 1,
  opacity: 1,
  rotation: 0,
};

export const BASE_TRAITS: StateTraits = {
  angleFields: new Set(['rotation']),
  nonInterpolatableFields: new Set(),
  defaultEasing: {
    x: inOut,
    y: inOut,
    scale: inOut,
    opacity: linear,
    rotation: inOut,
  },
};

export const VERTEX_TRAITS: StateTraits = {
  angleFields: BASE_TRAITS.angleFields,
  nonInterpolatableFields: new Set(['numVertices', 'closed']),
  defaultEasing: {
    ...BASE_TRAITS.defaultEasing,
    numVertices: step,
    closed: step,
    [CONTOURS_FIELD]: linear,
  },
};

/**
 * Values compare by identity, except colors which compare by channel.
 */
export function fieldValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a instanceof ColorClass && b instanceof ColorClass) {
    return a.equals(b);
  }
  return a === b;
}

/**
 * One shape's appearance at one instant: a typed property record.
 *
 * States are immutable. `with()` returns a copy carrying the same type,
 * traits and metadata.
 */
export class StateClass {
  readonly type: string;
  readonly fields: StateFields;
  readonly traits: StateTraits;
  /** Free-form data carried through interpolation untouched. */
  readonly meta: Readonly<Record<string, unknown>>;

  constructor(
    type: string,
    fields: StateFields,
    traits: StateTraits = BASE_TRAITS,
    meta: Readonly<Record<string, unknown>> = {},
  ) {
    this.type = type;
    this.fields = Object.freeze({ ...BASE_FIELDS, ...fields });
    this.traits = traits;
    this.meta = meta;
  }

  get fieldNames(): string[] {
    return Object.keys(this.fields);
  }

  get(name: string): FieldValue | undefined {
    return this.fields[name];
  }

  getNumber(name: string, fallback = 0): number {
    const value = this.fields[name];
    return typeof value === 'number' ? value : fallback;
  }

  isAngle(name: string): boolean {
    return this.traits.angleFields.has(name);
  }

  isNonInterpolatable(name: string): boolean {
    return this.traits.nonInterpolatableFields.has(name);
  }

  defaultEasingFor(name: string): EasingFunction | undefined {
    return this.traits.defaultEasing[name];
  }

  /** States without a `closed` field count as closed. */
  get closed(): boolean {
    const value = this.fields.closed;
    return typeof value === 'boolean' ? value : true;
  }

  get rotation(): number {
    return this.getNumber('rotation');
  }

  getContours(): VertexContoursClass | null {
    const value = this.fields[CONTOURS_FIELD];
    return value instanceof VertexContoursClass ? value : null;
  }

  with(updates: Readonly<Record<string, FieldValue>>): StateClass {
    return new StateClass(this.type, { ...this.fields, ...updates }, this.traits, this.meta);
  }

  toJSON(): Record<string, unknown> {
    const fields: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(this.fields)) {
      if (value instanceof ColorClass || value instanceof VertexContoursClass) {
        fields[name] = value.toJSON();
      } else {
        fields[name] = value;
      }
    }
    return { type: this.type, ...fields };
  }
}
