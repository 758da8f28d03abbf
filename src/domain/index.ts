export type {
  ObjectRecord,
  ObjectProperties,
  FlatValue,
  NormalizedRecord,
  SerializedItem,
  Batch,
} from './object.js';
