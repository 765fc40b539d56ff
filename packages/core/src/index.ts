/**
 * @rtf-composer/core
 *
 * Builds RTF documents incrementally: register fonts, colors and styles
 * on a template, author paragraphs, runs and footnotes on a document,
 * then serialize or save it.
 *
 * @packageDocumentation
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  LengthInput,
  LengthUnit,
  FontFamily,
  FontPitch,
  FontOptions,
  ColorOptions,
  Alignment,
  TextDirection,
  StyleAttributes,
  StyleOptions,
  StyleKind,
  PageLayout,
  LayoutOverrides,
  FootnotePosition,
  FootnoteNumbering,
  FootnoteOptions,
  InlineFormat,
  DocumentSnapshot,
  SerializeOptions,
  SaveOptions,
  ErrorType,
  ErrorResponse,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  RtfComposerError,
  ParseError,
  ConfigError,
  isErrorResponse,
  toErrorResponse,
} from './errors/index.js';

// ============================================================================
// Logging
// ============================================================================

export {
  LoggingService,
  LogLevel,
  StderrSink,
  MemorySink,
  parseLogLevel,
  getLogger,
  initializeLogger,
} from './services/LoggingService.js';
export type { LogSink } from './services/LoggingService.js';

// ============================================================================
// Units and Encoding
// ============================================================================

export {
  CM_TO_TWIPS,
  MM_TO_TWIPS,
  IN_TO_TWIPS,
  TWIPS_TO_CM,
  TWIPS_TO_IN,
  UNSET_LENGTH,
  parseLength,
  roundHalfEven,
  twipsToCm,
  twipsToMm,
  twipsToInches,
  formatLength,
} from './utils/units.js';

export {
  encodeRtfText,
  toRtfEscapeValue,
  decodeRtfEscapeValue,
  formatControlWord,
} from './utils/rtfEncoding.js';

// ============================================================================
// Resources and Templates
// ============================================================================

export { ResourceTable } from './resources/ResourceTable.js';
export { Font, FontTable } from './resources/Font.js';
export { Color, ColorTable } from './resources/Color.js';
export { Style, StyleSheet, DEFAULT_ALIGNMENT, styleNumber } from './resources/Style.js';
export { DocumentTemplate } from './template/DocumentTemplate.js';
export type { DocumentTemplateOptions } from './template/DocumentTemplate.js';
export { createDefaultTemplate } from './template/defaultTemplate.js';

// ============================================================================
// Layout
// ============================================================================

export {
  LAYOUT_PRESET_NAMES,
  DEFAULT_LAYOUT,
  isLayoutPresetName,
  getLayoutPreset,
  resolveLayout,
  describeLayout,
} from './layout/presets.js';
export type { LayoutPresetName } from './layout/presets.js';

// ============================================================================
// Document, Serializer and Writer
// ============================================================================

export { RtfDocument, AUTO_FOOTNOTE_ANCHOR } from './document/RtfDocument.js';
export type { RtfDocumentOptions } from './document/RtfDocument.js';

export {
  serializeDocument,
  renderCreationTime,
  renderFootnoteOptions,
  DEFAULT_FOOTNOTE_OPTIONS,
  FOOTNOTE_POSITIONS,
  FOOTNOTE_NUMBERINGS,
  GENERATOR_NAME,
  GENERATOR_VERSION,
} from './serializer/RtfSerializer.js';

export { RtfFileWriter, RTF_EXTENSION } from './io/RtfFileWriter.js';
export type { WriteTarget } from './io/RtfFileWriter.js';
