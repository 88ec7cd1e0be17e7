export { generateId } from './id.js';
export { monotonicNow, isoNow } from './clock.js';
export {
  SinewError,
  ValidationError,
  ConstructionError,
  StorageError,
  NotFoundError,
  ConfigError,
  errorMessage,
} from './errors.js';
export { vectorAdd, vectorScale, computeCentroid, cosineSimilarity, isVector } from './vector.js';
export {
  createConcept,
  createEdge,
  createProvenance,
  clampUnit,
  isRecord,
  readString,
  readNumber,
  readStringArray,
} from './entities.js';
