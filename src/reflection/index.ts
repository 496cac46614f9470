export {
  Reflector,
  buildStrategy,
  failedWorkers,
  bestQualifyingOutcome,
  type ReflectorOptions,
  type ReflectableState,
} from './reflector.js';
