import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  FOOTNOTE_NUMBERINGS,
  FOOTNOTE_POSITIONS,
  LAYOUT_PRESET_NAMES,
} from '@rtf-composer/core';

/**
 * Inline formats accepted by `text` blocks
 */
export const INLINE_FORMAT_NAMES = [
  'bold',
  'italic',
  'bold-italic',
  'subscript',
  'superscript',
  'small-caps',
] as const;

export const BLOCK_TYPES = [
  'paragraph',
  'text',
  'footnote',
  'close_footnote',
  'close_paragraph',
] as const;

export const LAYOUT_OVERRIDE_KEYS = [
  'paper_height',
  'paper_width',
  'margin_top',
  'margin_bottom',
  'margin_left',
  'margin_right',
] as const;

/**
 * Shared schema definitions to reduce duplication
 */
const lengthSchema = {
  type: ['string', 'number'],
  description: 'Length literal: twips ("720" or 720), or a number followed by cm, mm or in ("2.5cm")',
};

const layoutOverridesSchema = {
  type: 'object',
  properties: Object.fromEntries(LAYOUT_OVERRIDE_KEYS.map((key) => [key, lengthSchema])),
  additionalProperties: false,
};

const footnoteOptionsSchema = {
  type: 'object',
  properties: {
    position: { type: 'string', enum: [...FOOTNOTE_POSITIONS], description: 'Where footnote text is placed' },
    restart_each_page: { type: 'boolean', description: 'Restart numbering on each page' },
    restart_each_section: { type: 'boolean', description: 'Restart numbering on each section' },
    numbering: { type: 'string', enum: [...FOOTNOTE_NUMBERINGS], description: 'Numbering style' },
  },
  additionalProperties: false,
};

const blockSchema = {
  type: 'object',
  properties: {
    type: { type: 'string', enum: [...BLOCK_TYPES], description: 'Authoring step' },
    text: { type: 'string', description: 'Text of the paragraph, run or footnote' },
    style: { type: 'string', description: 'Style id such as "s21"; unknown ids fall back to the default' },
    format: { type: 'string', enum: [...INLINE_FORMAT_NAMES], description: 'Formatting for a text run' },
    control_word: { type: 'string', description: 'Raw control word for a text run, e.g. "ul" or "cf2"' },
    anchor: { type: 'string', description: 'Custom footnote marker; omitted means automatic numbering' },
  },
  required: ['type'],
  additionalProperties: false,
};

/**
 * Tool definitions for the MCP server.
 *
 * Each tool defines:
 * - name: Unique tool identifier
 * - description: User-friendly description
 * - inputSchema: JSON Schema for input validation
 */
export const tools: Tool[] = [
  {
    name: 'compose_document',
    description: 'Build an RTF document from a list of authoring steps (paragraphs, text runs and footnotes) using the built-in template. Saves it to the output folder, or returns the RTF text when save is false.',
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Document title' },
        author: { type: 'string', description: 'Document author' },
        filename: { type: 'string', description: 'File name without extension (defaults to the title)' },
        layout: { type: 'string', enum: [...LAYOUT_PRESET_NAMES], description: 'Page layout preset' },
        layout_overrides: layoutOverridesSchema,
        footnotes: footnoteOptionsSchema,
        paragraph_style: { type: 'string', description: 'Default paragraph style id' },
        footnote_style: { type: 'string', description: 'Default footnote style id' },
        blocks: { type: 'array', items: blockSchema, description: 'Authoring steps in order' },
        save: { type: 'boolean', description: 'Write the file (default true)' },
      },
      required: ['title', 'blocks'],
      additionalProperties: false,
    },
  },
  {
    name: 'convert_length',
    description: 'Convert a length literal such as "2.5cm", "1in" or "720" to twips, centimetres and inches.',
    inputSchema: {
      type: 'object',
      properties: {
        value: lengthSchema,
      },
      required: ['value'],
      additionalProperties: false,
    },
  },
  {
    name: 'encode_text',
    description: 'Escape text for an RTF body. Reserved characters and non-ASCII characters become \\uN? escapes.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to escape' },
      },
      required: ['text'],
      additionalProperties: false,
    },
  },
  {
    name: 'list_layout_presets',
    description: 'List the page layout presets with their geometry in twips.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: 'list_styles',
    description: 'List the styles of the built-in template with their attributes.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
];
