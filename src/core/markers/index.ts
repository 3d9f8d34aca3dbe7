export {
  MARKER_ID_PATTERN,
  formatEndToken,
  formatStartToken,
  matchMarkerToken,
  scaffoldMarker,
  type MarkerToken,
} from './grammar.js';
export { parseDocument, regionsOf, serializeDocument, splitLines } from './parser.js';
export * from './types.js';
