/**
 * Constructors, guards and plain-value adapters for {@link FillingValue}.
 *
 * The engine only ever sees the tagged union. Callers usually start from a
 * plain object and convert it once:
 *
 * ```typescript
 * const filling = fromPlain({
 *   title: 'Orders',
 *   rows: [
 *     { TEMPLATE: 'row', id: 1 },
 *     { TEMPLATE: 'row', id: 2 },
 *   ],
 * });
 * ```
 *
 * @module
 */

import type {
  FillingValue,
  ObjectFilling,
  PlainFilling,
  ScalarFilling,
  ScalarValue,
  SequenceFilling,
} from '../types/filling.js';
import { InvalidFillingShapeError } from '../errors/render-errors.js';

/** Default reserved field naming a nested template. */
export const DEFAULT_NAME_LABEL = 'TEMPLATE';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function scalar(value: ScalarValue): ScalarFilling {
  return { kind: 'scalar', value };
}

export function object(
  fields: ReadonlyMap<string, FillingValue> | Iterable<readonly [string, FillingValue]> = [],
): ObjectFilling {
  return { kind: 'object', fields: new Map(fields) };
}

export function sequence(items: Iterable<FillingValue>): SequenceFilling {
  return { kind: 'sequence', items: [...items] };
}

/**
 * Builds an object filling that instantiates `templateId`.
 */
export function nested(
  templateId: string,
  fields: Iterable<readonly [string, FillingValue]> = [],
  nameLabel: string = DEFAULT_NAME_LABEL,
): ObjectFilling {
  const map = new Map<string, FillingValue>(fields);
  map.set(nameLabel, scalar(templateId));
  return { kind: 'object', fields: map };
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isScalar(value: FillingValue): value is ScalarFilling {
  return value.kind === 'scalar';
}

export function isObject(value: FillingValue): value is ObjectFilling {
  return value.kind === 'object';
}

export function isSequence(value: FillingValue): value is SequenceFilling {
  return value.kind === 'sequence';
}

/**
 * Returns the template id an object filling refers to, or `undefined` when
 * the name label is absent.
 *
 * @throws {InvalidFillingShapeError} If the name label is present but is not
 *   a string scalar.
 */
export function templateNameOf(
  filling: ObjectFilling,
  nameLabel: string = DEFAULT_NAME_LABEL,
): string | undefined {
  const label = filling.fields.get(nameLabel);
  if (label === undefined) {
    return undefined;
  }
  if (label.kind !== 'scalar' || typeof label.value !== 'string') {
    throw new InvalidFillingShapeError(`name label "${nameLabel}" must be a string`);
  }
  return label.value;
}

// ---------------------------------------------------------------------------
// Plain value adapters
// ---------------------------------------------------------------------------

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function convert(value: unknown, path: string): FillingValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return scalar(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidFillingShapeError(`${path}: number must be finite, got ${value}`);
    }
    return scalar(value);
  }

  if (value === null) {
    return scalar(null);
  }

  if (typeof value !== 'object') {
    throw new InvalidFillingShapeError(`${path}: unsupported value of type ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return sequence(value.map((item: unknown, i) => convert(item, `${path}[${i}]`)));
  }

  if (!isPlainObject(value)) {
    // "[object Date]" -> "Date"; works for objects without a constructor too
    const tag = Object.prototype.toString.call(value).slice(8, -1);
    throw new InvalidFillingShapeError(`${path}: unsupported object (${tag})`);
  }

  const fields = new Map<string, FillingValue>();
  for (const key of Object.keys(value)) {
    fields.set(key, convert(value[key], `${path}.${key}`));
  }
  return { kind: 'object', fields };
}

/**
 * Converts a plain JavaScript value into a {@link FillingValue}.
 *
 * Accepts strings, finite numbers, booleans, `null`, arrays and plain
 * objects, recursively. `undefined`, functions, symbols, bigints, class
 * instances (including `Date`) and non-finite numbers are rejected.
 *
 * @throws {InvalidFillingShapeError} With the path of the offending value.
 */
export function fromPlain(value: unknown): FillingValue {
  return convert(value, '$');
}

/**
 * Converts a filling back to its plain JavaScript form.
 */
export function toPlain(value: FillingValue): PlainFilling {
  switch (value.kind) {
    case 'scalar':
      return value.value;
    case 'sequence':
      return value.items.map(toPlain);
    case 'object': {
      const result: Record<string, PlainFilling> = {};
      for (const [key, field] of value.fields) {
        result[key] = toPlain(field);
      }
      return result;
    }
  }
}

/**
 * Converts a plain record of fillings (e.g. policy defaults) into a map.
 */
export function fromPlainRecord(record: Readonly<Record<string, unknown>>): ReadonlyMap<string, FillingValue> {
  const map = new Map<string, FillingValue>();
  for (const key of Object.keys(record)) {
    map.set(key, convert(record[key], key));
  }
  return map;
}
