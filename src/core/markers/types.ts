/**
 * Marker model: the closed set of marker kinds, their out-of-band
 * definitions, and the parsed document structure.
 */
import type { LanguageProfile } from '../languages/types.js';

export const MARKER_KINDS = ['guard', 'generated', 'conditional', 'import', 'template'] as const;

export type MarkerKind = (typeof MARKER_KINDS)[number];

/** Unique within one document; correlates a marker across parses. */
export type MarkerId = string;

export type GenerationStrategy = 'replace' | 'merge' | 'if-empty' | 'append' | 'prepend';

export type ConditionalStrategy = 'include' | 'exclude' | 'switch';

export type ImportType = 'module' | 'dependency' | 'local' | 'namespace';

export type ImportMergeStrategy = 'keep-existing' | 'replace' | 'merge' | 'interactive';

export type ParameterType = 'string' | 'integer' | 'float' | 'boolean' | 'array' | 'object' | 'custom';

/**
 * Where a marker's fresh content comes from.
 */
export type ContentSource =
  | { type: 'static'; text: string }
  | { type: 'template'; template: string }
  | { type: 'key'; key: string; join?: string }
  | { type: 'function'; name: string; args?: Record<string, unknown> }
  | { type: 'component'; componentType: string; properties: Record<string, unknown> };

export interface TemplateParameter {
  type: ParameterType;
  /** Model path to read; defaults to the parameter name */
  from?: string;
  default?: unknown;
  required: boolean;
  description?: string;
}

export interface IterationSettings {
  /** Model path (or parameter name) of the array to iterate */
  dataSource: string;
  itemVar: string;
  indexVar?: string;
  /** Joins instances; falls back to the generator's configured separator */
  separator?: string;
}

export interface GuardMarker {
  kind: 'guard';
  id: MarkerId;
  preserveIndent: boolean;
  defaultContent?: string;
}

export interface GeneratedMarker {
  kind: 'generated';
  id: MarkerId;
  strategy: GenerationStrategy;
  dependencies: string[];
  source: ContentSource;
}

export interface ConditionalMarker {
  kind: 'conditional';
  id: MarkerId;
  condition: string;
  strategy: ConditionalStrategy;
  /** Body for include/exclude */
  source?: ContentSource;
  /** Templates for switch, keyed by the condition's value; `default` is the fallback */
  alternatives?: Record<string, string>;
  dependencies: string[];
}

export interface ImportMarker {
  kind: 'import';
  id: MarkerId;
  importType: ImportType;
  mergeStrategy: ImportMergeStrategy;
  /** Rendered text; each non-blank line is one required import */
  source: ContentSource;
  dependencies: string[];
}

export interface TemplateMarker {
  kind: 'template';
  id: MarkerId;
  body: string;
  parameters: Record<string, TemplateParameter>;
  iteration?: IterationSettings;
  dependencies: string[];
}

export type MarkerType =
  | GuardMarker
  | GeneratedMarker
  | ConditionalMarker
  | ImportMarker
  | TemplateMarker;

export type GeneratingMarker = Exclude<MarkerType, GuardMarker>;

// =============================================================================
// PARSED DOCUMENT
// =============================================================================

export interface RegionSpan {
  /** 1-based line of the start token */
  startLine: number;
  /** 1-based line of the end token */
  endLine: number;
  /** Character offset of the start token line */
  startOffset: number;
  /** Character offset just past the end token line (including its newline) */
  endOffset: number;
}

/**
 * A marker occurrence as found in the text. Attributes are not encoded in
 * the delimiter; they are bound from the catalog.
 */
export interface Region {
  kind: MarkerKind;
  id: MarkerId;
  /** Leading whitespace of the start token line */
  indent: string;
  span: RegionSpan;
  /** Start token line exactly as written, including its line ending */
  startToken: string;
  /** End token line exactly as written, including its line ending (may be empty at EOF) */
  endToken: string;
  /** Exact text between the two token lines */
  rawContent: string;
}

export type Segment =
  | { type: 'verbatim'; text: string }
  | { type: 'region'; region: Region };

export interface ParsedDocument {
  file?: string;
  profile: LanguageProfile;
  segments: Segment[];
  /** Line ending used for newly written bodies */
  lineEnding: '\n' | '\r\n';
}

export type ParseErrorCode = 'UNBALANCED_MARKER' | 'DUPLICATE_ID' | 'UNKNOWN_KIND' | 'NESTED_MARKER';

export interface ParseError {
  code: ParseErrorCode;
  message: string;
  /** 1-based line where the problem was detected */
  line: number;
  markerId?: MarkerId;
}

export type ParseResult =
  | { success: true; document: ParsedDocument }
  | { success: false; error: ParseError };

/**
 * A region with its definition and last known baseline attached.
 */
export interface BoundRegion extends Region {
  /** Undefined when the catalog has no definition for a non-guard marker */
  marker?: MarkerType;
  /** Last content the engine wrote; equals rawContent when none is recorded */
  baselineContent: string;
  hasBaseline: boolean;
  isModified: boolean;
}

export type BoundSegment =
  | { type: 'verbatim'; text: string }
  | { type: 'region'; region: BoundRegion };

export interface BoundDocument extends Omit<ParsedDocument, 'segments'> {
  segments: BoundSegment[];
}

export function isMarkerKind(value: string): value is MarkerKind {
  return (MARKER_KINDS as readonly string[]).includes(value);
}
