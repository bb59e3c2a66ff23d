export {
  LinesError,
  internalError,
  invalidParams,
  isLinesError,
  malformedIdentifier,
  toLinesError,
  unknownEnergyLabel,
  unknownSpecies,
} from './errors.js';
export type { ErrorCode, LinesErrorPayload } from './errors.js';
