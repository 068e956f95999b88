export {
  DEFAULT_NAME_LABEL,
  scalar,
  object,
  sequence,
  nested,
  isScalar,
  isObject,
  isSequence,
  templateNameOf,
  fromPlain,
  toPlain,
  fromPlainRecord,
} from './filling-value.js';
