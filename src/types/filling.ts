/**
 * Filling values: what gets substituted at each token.
 *
 * @module
 */

export type ScalarValue = string | number | boolean | null;

export interface ScalarFilling {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
}

/**
 * A mapping of field names to fillings. When it carries the policy's name
 * label it stands for an instance of the named template.
 */
export interface ObjectFilling {
  readonly kind: 'object';
  readonly fields: ReadonlyMap<string, FillingValue>;
}

/** Repeated fillings for one token, rendered in order. */
export interface SequenceFilling {
  readonly kind: 'sequence';
  readonly items: readonly FillingValue[];
}

export type FillingValue = ScalarFilling | ObjectFilling | SequenceFilling;

/**
 * Plain JavaScript form of a filling, as produced by `JSON.parse` or a YAML
 * parser.
 */
export type PlainFilling =
  | ScalarValue
  | readonly PlainFilling[]
  | { readonly [field: string]: PlainFilling };

/** Plain object form of a filling (the usual root of a render). */
export type PlainFillingObject = { readonly [field: string]: PlainFilling };
