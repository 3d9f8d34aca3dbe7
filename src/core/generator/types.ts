/**
 * Generation inputs and outcomes.
 */
import type { MarkerId, MarkerKind } from '../markers/types.js';
import type { ModelSnapshot } from './model.js';

export type GenerationErrorCode =
  | 'MISSING_PARAMETER'
  | 'INVALID_PARAMETER'
  | 'MISSING_DATA_SOURCE'
  | 'UNEVALUABLE_CONDITION'
  | 'UNKNOWN_ALTERNATIVE'
  | 'UNKNOWN_FUNCTION'
  | 'FUNCTION_FAILED'
  | 'MISSING_DEFINITION';

/**
 * Fatal for one marker only: its previous content is kept.
 */
export interface GenerationError {
  file?: string;
  markerId: MarkerId;
  kind: MarkerKind;
  code: GenerationErrorCode;
  message: string;
}

export interface GenerationRequest {
  model: ModelSnapshot;
  /** Current body of the marker, dedented to the marker column, without trailing newline */
  existing: string;
  file?: string;
}

export type GenerationOutcome =
  | {
      ok: true;
      content: string;
      /**
       * Set when the strategy needs a caller decision before `pending` can
       * be written (interactive imports). `content` then holds the text to
       * keep in the meantime.
       */
      pending?: string;
    }
  | { ok: false; error: GenerationError };

/**
 * Input handed to user-supplied generator functions.
 * Functions must be pure and synchronous.
 */
export interface GeneratorFunctionInput {
  markerId: MarkerId;
  model: ModelSnapshot;
  args: Record<string, unknown>;
  existing: string;
}

export type GeneratorFunction = (input: GeneratorFunctionInput) => string;

export interface ComponentRenderInput {
  markerId: MarkerId;
  model: ModelSnapshot;
  componentType: string;
  properties: Record<string, unknown>;
}

export type ComponentRenderer = (input: ComponentRenderInput) => string;
