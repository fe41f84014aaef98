/**
 * Snippet synthesizer exports
 */

export {
  MAX_ID_LENGTH,
  md5Hex,
  sanitizeIdName,
  makeId,
  randomGuid,
  type GuidGenerator,
} from './identifiers.js';

export {
  UNKNOWN_COMPONENT_ID,
  escapeXmlAttribute,
  synthesizeFileFragment,
  synthesizeRegistryFragment,
  type CorrectiveFragment,
  type SynthesizeOptions,
} from './fragment.js';
