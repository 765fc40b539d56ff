/**
 * Core type definitions for rtf-composer
 *
 * Shared by the engine and the MCP server. Types are organized by domain.
 */

// ============================================================================
// Length Models
// ============================================================================

/**
 * A length literal: `""` (unset), `"<integer>"` (twips), `"<number>cm"`,
 * `"<number>mm"`, `"<number>in"`, or a number of twips.
 */
export type LengthInput = string | number;

export type LengthUnit = 'twips' | 'cm' | 'mm' | 'in';

// ============================================================================
// Resource Models
// ============================================================================

/**
 * Font family classification used in the font table
 */
export type FontFamily =
  | 'nil'
  | 'roman'
  | 'swiss'
  | 'modern'
  | 'script'
  | 'decor'
  | 'tech'
  | 'bidi';

/**
 * Font pitch: 0 default, 1 fixed, 2 variable
 */
export type FontPitch = 0 | 1 | 2;

export interface FontOptions {
  id: string;                    // Table key, e.g. "f0"
  name: string;                  // Display name, e.g. "Times New Roman"
  family?: FontFamily;           // Defaults to 'nil'
  pitch?: FontPitch;
  charset?: number;              // Character set code (0 = ANSI)
}

export interface ColorOptions {
  id: string;                    // Color table index as a decimal string
  red?: number;                  // 0-255
  green?: number;                // 0-255
  blue?: number;                 // 0-255
}

export type Alignment = 'left' | 'right' | 'center' | 'justify';

export type TextDirection = 'rtl' | 'ltr';

/**
 * Formatting attributes of a style. Absent fields emit nothing.
 */
export interface StyleAttributes {
  alignment?: Alignment;
  font?: string;                 // Font id, e.g. "f1"
  fontSize?: number;             // Half-points
  lineSpacing?: number;          // Twips, emitted as a multiple
  spaceBefore?: number;          // Twips
  spaceAfter?: number;           // Twips
  keepWithNext?: boolean;
  bold?: boolean;
  italic?: boolean;
  smallCaps?: boolean;
  caps?: boolean;
  widowControl?: boolean;        // false emits an explicit "off"
  hyphenation?: boolean;
  direction?: TextDirection;
  color?: string;                // Color id
  firstLineIndent?: number;      // Twips, may be negative
  leftIndent?: number;           // Twips
  rightIndent?: number;          // Twips
  language?: number;             // Language code, e.g. 1033
}

export interface StyleOptions extends StyleAttributes {
  id: string;                    // e.g. "s21"
  name: string;
  basedOn?: string;              // Defaults to the style itself
  next?: string;                 // Defaults to the style itself
}

/**
 * Which default a style lookup falls back to
 */
export type StyleKind = 'paragraph' | 'footnote';

// ============================================================================
// Layout Models
// ============================================================================

/**
 * Page geometry, all values in twips
 */
export interface PageLayout {
  paperHeight: number;
  paperWidth: number;
  marginTop: number;
  marginBottom: number;
  marginLeft: number;
  marginRight: number;
}

/**
 * Explicit geometry overrides, each a length literal
 */
export type LayoutOverrides = {
  [K in keyof PageLayout]?: LengthInput;
};

// ============================================================================
// Footnote Models
// ============================================================================

export type FootnotePosition = 'below-text' | 'bottom-of-page';

export type FootnoteNumbering =
  | 'arabic'
  | 'lower-alpha'
  | 'upper-alpha'
  | 'lower-roman'
  | 'upper-roman';

export interface FootnoteOptions {
  position: FootnotePosition;
  restartEachPage: boolean;
  restartEachSection: boolean;
  numbering: FootnoteNumbering;
}

// ============================================================================
// Document Models
// ============================================================================

/**
 * Inline run formatting. Named formats map to fixed control words;
 * `controlWord` passes any other RTF keyword through.
 */
export type InlineFormat =
  | 'bold'
  | 'italic'
  | 'bold-italic'
  | 'subscript'
  | 'superscript'
  | 'small-caps'
  | { controlWord: string };

/**
 * State the serializer needs from a document
 */
export interface DocumentSnapshot {
  title: string;
  author: string;
  layout: PageLayout;
  footnotes: FootnoteOptions;
  body: string;
}

export interface SerializeOptions {
  generator?: string;            // Generator name written to the header
  generatorVersion?: string;
  now?: () => Date;              // Clock for the creation timestamp
}

export interface SaveOptions extends SerializeOptions {
  filename?: string;             // Without extension
  folder?: string;
}

// ============================================================================
// Error Models
// ============================================================================

export type ErrorType =
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'PROCESSING_ERROR';

/**
 * Error response
 */
export interface ErrorResponse {
  error: ErrorType;              // Error type
  message: string;               // Error message
  context?: Record<string, unknown>;  // Error context
  suggestions?: string[];        // Suggested fixes
}
