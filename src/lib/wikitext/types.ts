/**
 * Type definitions for the wikitext → Markdown translator
 */

// ============================================================================
// DIAGNOSTICS
// ============================================================================

/** Kind of non-fatal finding reported while translating markup */
export type DiagnosticKind =
  | 'unhandled-template'  // {{...}} with no rendering rule, dropped
  | 'malformed-markup'    // unbalanced braces/brackets, passed through
  | 'unresolved-link'     // [[Target]] with no page written for Target
  | 'unhandled-table'     // {| ... |} with no Markdown form, dropped

export interface Diagnostic {
  kind: DiagnosticKind
  message: string
  /** The construct (or its name) that triggered the diagnostic */
  detail?: string
}

// ============================================================================
// SCANNER
// ============================================================================

/** A balanced span found by the scanner */
export interface Span {
  start: number
  end: number
  /** Source text of the span, delimiters included */
  body: string
}

/** A `{{...}}` span with its normalized name */
export interface TemplateSpan extends Span {
  /** Lowercase, underscores to spaces, trimmed */
  name: string
}

export interface TemplateParam {
  /** Named key as written (trimmed) or positional index starting at "1" */
  key: string
  value: string
  positional: boolean
}

export interface ParsedTemplate {
  /** Template name as written (trimmed) */
  rawName: string
  /** Normalized name */
  name: string
  params: TemplateParam[]
}

// ============================================================================
// LINKS & IMAGES
// ============================================================================

export interface WikiLink {
  /** Normalized target title */
  target: string
  /** Text shown for the link: alias, or the target as written */
  display: string
  /** Section anchor, without the hash */
  anchor?: string
}

export interface ImageReference {
  /** Canonical wiki file name (no namespace prefix) */
  filename: string
  /** Path relative to the vault root */
  path: string
}

// ============================================================================
// INFOBOX
// ============================================================================

export interface InfoboxField {
  key: string
  value: string
}

export interface Infobox {
  /** Template name as written, e.g. "Infobox Character" */
  templateName: string
  /** Type name derived from the template, e.g. "Character" */
  type?: string
  fields: InfoboxField[]
  images: ImageReference[]
}

// ============================================================================
// RUN-SCOPED COLLABORATORS
// ============================================================================

/**
 * Noun inflection capability used for infobox tag inference.
 * Swap it to change locale or ruleset.
 */
export interface Inflector {
  singularize(word: string): string
}

/**
 * Sink for side effects of formatting a fragment: link targets and
 * image references found along the way.
 */
export interface FormatContext {
  /** Called once per internal link with its normalized target */
  onLink?: (target: string) => void
  /** Called once per file/image link */
  onImage?: (image: ImageReference) => void
  /** Directory images are mapped to (default "images") */
  imageDir?: string
}

export interface FormatResult {
  markdown: string
  diagnostics: Diagnostic[]
}
