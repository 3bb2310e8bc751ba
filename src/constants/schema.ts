/**
 * Document Schema Constants
 *
 * Tags and attributes a kinematic tree document may contain.
 * The root tag name is configurable and is validated against `ROOT_ATTRIBUTES`.
 */

export const TAGS = {
  OPTIONS: 'options',
  DEFAULTS: 'defaults',
  WORLDBODY: 'worldbody',
  BODY: 'body',
  GEOM: 'geom',
} as const;

export type SectionTag = (typeof TAGS)[keyof typeof TAGS];

export const ROOT_ATTRIBUTES = ['model'] as const;

export const OPTIONS_ATTRIBUTES = ['gravity', 'dt'] as const;

export const BODY_ATTRIBUTES = [
  'name',
  'pos',
  'quat',
  'euler',
  'joint',
  'armature',
  'damping',
] as const;

export const GEOM_ATTRIBUTES = ['type', 'mass', 'pos', 'dim'] as const;

/**
 * Allowed attributes per non-root tag.
 */
export const ALLOWED_ATTRIBUTES: Record<SectionTag, readonly string[]> = {
  [TAGS.OPTIONS]: OPTIONS_ATTRIBUTES,
  [TAGS.DEFAULTS]: [],
  [TAGS.WORLDBODY]: [],
  [TAGS.BODY]: BODY_ATTRIBUTES,
  [TAGS.GEOM]: GEOM_ATTRIBUTES,
};

/**
 * Tags each element may be nested under. `null` stands for the document root.
 */
export const ALLOWED_PARENTS: Record<SectionTag, readonly (SectionTag | null)[]> = {
  [TAGS.OPTIONS]: [null],
  [TAGS.DEFAULTS]: [null],
  [TAGS.WORLDBODY]: [null],
  [TAGS.BODY]: [TAGS.WORLDBODY, TAGS.BODY, TAGS.DEFAULTS],
  [TAGS.GEOM]: [TAGS.BODY, TAGS.DEFAULTS],
};

export function isSectionTag(tag: string): tag is SectionTag {
  return Object.prototype.hasOwnProperty.call(ALLOWED_ATTRIBUTES, tag);
}

/**
 * Number of `dim` entries each geometry shape takes.
 */
export const GEOM_DIM_ARITY = {
  box: 3,
  sphere: 1,
  cylinder: 2,
} as const;

export type GeomShape = keyof typeof GEOM_DIM_ARITY;

export function isGeomShape(value: string): value is GeomShape {
  return Object.prototype.hasOwnProperty.call(GEOM_DIM_ARITY, value);
}
