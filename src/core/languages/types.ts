/**
 * Comment syntax of a target language, used to recognize marker tokens.
 */
export interface LanguageProfile {
  /** Stable language identifier, e.g. "typescript" */
  readonly id: string;
  /** File extensions without the leading dot, lower case */
  readonly extensions: readonly string[];
  /** Line comment prefix, e.g. "//" or "#" */
  readonly lineComment?: string;
  /** Block comment delimiters, e.g. { open: "/*", close: "*\/" } */
  readonly blockComment?: { readonly open: string; readonly close: string };
}
