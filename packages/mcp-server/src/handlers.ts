/**
 * Tool request handlers for the MCP server.
 * Each handler validates its arguments and delegates to the core package.
 */

import * as path from 'path';
import {
  FOOTNOTE_NUMBERINGS,
  FOOTNOTE_POSITIONS,
  LAYOUT_PRESET_NAMES,
  ConfigError,
  RtfDocument,
  RtfFileWriter,
  createDefaultTemplate,
  encodeRtfText,
  formatLength,
  getLayoutPreset,
  parseLength,
  toErrorResponse,
  type ErrorResponse,
  type FootnoteOptions,
  type InlineFormat,
  type LayoutOverrides,
  type LoggingService,
} from '@rtf-composer/core';
import type { Config } from './config.js';
import { BLOCK_TYPES, INLINE_FORMAT_NAMES, LAYOUT_OVERRIDE_KEYS } from './tools.js';
import {
  collectValidationErrors,
  createValidationErrorResponse,
  isRecord,
  oneOf,
  validateArray,
  validateBoolean,
  validateEnum,
  validateFileName,
  validateKnownKeys,
  validateLength,
  validateObject,
  validateString,
  type ValidationError,
} from './utils/validation.js';

export interface Services {
  config: Config;
  logger: LoggingService;
  writer?: RtfFileWriter;
  now?: () => Date;
}

export type ToolArgs = Record<string, unknown>;

type ToolHandler = (args: ToolArgs, services: Services) => Promise<unknown>;

type Block =
  | { type: 'paragraph'; text: string; style: string }
  | { type: 'text'; text: string; format?: InlineFormat }
  | { type: 'footnote'; text: string; style: string; anchor?: string }
  | { type: 'close_footnote' }
  | { type: 'close_paragraph' };

const COMPOSE_KEYS = [
  'title', 'author', 'filename', 'layout', 'layout_overrides', 'footnotes',
  'paragraph_style', 'footnote_style', 'blocks', 'save',
];
const FOOTNOTE_KEYS = ['position', 'restart_each_page', 'restart_each_section', 'numbering'];
const BLOCK_KEYS = ['type', 'text', 'style', 'format', 'control_word', 'anchor'];

const LAYOUT_FIELDS: Record<(typeof LAYOUT_OVERRIDE_KEYS)[number], keyof LayoutOverrides> = {
  paper_height: 'paperHeight',
  paper_width: 'paperWidth',
  margin_top: 'marginTop',
  margin_bottom: 'marginBottom',
  margin_left: 'marginLeft',
  margin_right: 'marginRight',
};

function stringArg(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanArg(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  return typeof value === 'boolean' ? value : undefined;
}

function validateBlock(value: unknown, index: number): ValidationError[] {
  const field = `blocks[${index}]`;
  const objectError = validateObject(value, field);
  if (objectError || !isRecord(value)) {
    return objectError ? [objectError] : [];
  }

  const errors = [
    ...validateKnownKeys(value, field, BLOCK_KEYS),
    ...collectValidationErrors([
      () => validateEnum(value.type, `${field}.type`, BLOCK_TYPES),
      () => validateString(value.style, `${field}.style`, false),
      () => validateEnum(value.format, `${field}.format`, INLINE_FORMAT_NAMES, false),
      () => validateString(value.control_word, `${field}.control_word`, false),
      () => validateString(value.anchor, `${field}.anchor`, false),
    ]),
  ];

  // Runs and footnotes need text; paragraphs may start empty
  const textRequired = value.type === 'text' || value.type === 'footnote';
  const textError = textRequired && typeof value.text === 'string'
    ? null
    : validateString(value.text, `${field}.text`, textRequired);
  if (textError) {
    errors.push(textError);
  }

  if (value.format !== undefined && value.control_word !== undefined) {
    errors.push({
      field: `${field}.control_word`,
      message: `${field} cannot have both format and control_word`,
      value: value.control_word,
    });
  }

  return errors;
}

function toBlock(value: Record<string, unknown>): Block {
  const text = stringArg(value, 'text') ?? '';
  const style = stringArg(value, 'style') ?? '';

  switch (oneOf(BLOCK_TYPES, value.type)) {
    case 'paragraph':
      return { type: 'paragraph', text, style };
    case 'text': {
      const controlWord = stringArg(value, 'control_word');
      const format = controlWord !== undefined
        ? { controlWord }
        : oneOf(INLINE_FORMAT_NAMES, value.format);
      return { type: 'text', text, format };
    }
    case 'footnote':
      return { type: 'footnote', text, style, anchor: stringArg(value, 'anchor') };
    case 'close_footnote':
      return { type: 'close_footnote' };
    default:
      return { type: 'close_paragraph' };
  }
}

function toLayoutOverrides(value: unknown): LayoutOverrides {
  const overrides: LayoutOverrides = {};
  if (!isRecord(value)) {
    return overrides;
  }

  for (const key of LAYOUT_OVERRIDE_KEYS) {
    const raw = value[key];
    if (typeof raw === 'string' || typeof raw === 'number') {
      overrides[LAYOUT_FIELDS[key]] = raw;
    }
  }
  return overrides;
}

function toFootnoteOptions(value: unknown): Partial<FootnoteOptions> {
  const options: Partial<FootnoteOptions> = {};
  if (!isRecord(value)) {
    return options;
  }

  const position = oneOf(FOOTNOTE_POSITIONS, value.position);
  const numbering = oneOf(FOOTNOTE_NUMBERINGS, value.numbering);
  const restartEachPage = booleanArg(value, 'restart_each_page');
  const restartEachSection = booleanArg(value, 'restart_each_section');

  if (position !== undefined) options.position = position;
  if (numbering !== undefined) options.numbering = numbering;
  if (restartEachPage !== undefined) options.restartEachPage = restartEachPage;
  if (restartEachSection !== undefined) options.restartEachSection = restartEachSection;
  return options;
}

function validateComposeArgs(args: ToolArgs): ValidationError[] {
  const errors = [
    ...validateKnownKeys(args, '', COMPOSE_KEYS),
    ...collectValidationErrors([
      () => validateString(args.title, 'title'),
      () => validateString(args.author, 'author', false),
      () => validateString(args.filename, 'filename', false),
      () => validateEnum(args.layout, 'layout', LAYOUT_PRESET_NAMES, false),
      () => validateObject(args.layout_overrides, 'layout_overrides', false),
      () => validateObject(args.footnotes, 'footnotes', false),
      () => validateString(args.paragraph_style, 'paragraph_style', false),
      () => validateString(args.footnote_style, 'footnote_style', false),
      () => validateArray(args.blocks, 'blocks'),
      () => validateBoolean(args.save, 'save', false),
    ]),
  ];

  // The file name, or the title standing in for it, must not leave the output folder
  const fileNameField = args.filename !== undefined ? 'filename' : 'title';
  const fileName = args[fileNameField];
  const titleError = fileNameField === 'title' && validateString(fileName, 'title') !== null;
  if (args.save !== false && typeof fileName === 'string' && !titleError) {
    const fileNameError = validateFileName(fileName, fileNameField);
    if (fileNameError) errors.push(fileNameError);
  }

  const overrides = args.layout_overrides;
  errors.push(...validateKnownKeys(overrides, 'layout_overrides', LAYOUT_OVERRIDE_KEYS));
  if (isRecord(overrides)) {
    for (const key of LAYOUT_OVERRIDE_KEYS) {
      const error = validateLength(overrides[key], `layout_overrides.${key}`, false);
      if (error) errors.push(error);
    }
  }

  const footnotes = args.footnotes;
  errors.push(...validateKnownKeys(footnotes, 'footnotes', FOOTNOTE_KEYS));
  if (isRecord(footnotes)) {
    errors.push(...collectValidationErrors([
      () => validateEnum(footnotes.position, 'footnotes.position', FOOTNOTE_POSITIONS, false),
      () => validateEnum(footnotes.numbering, 'footnotes.numbering', FOOTNOTE_NUMBERINGS, false),
      () => validateBoolean(footnotes.restart_each_page, 'footnotes.restart_each_page', false),
      () => validateBoolean(footnotes.restart_each_section, 'footnotes.restart_each_section', false),
    ]));
  }

  if (Array.isArray(args.blocks)) {
    args.blocks.forEach((block: unknown, index) => errors.push(...validateBlock(block, index)));
  }

  return errors;
}

function validateNoArgs(args: ToolArgs): ValidationError[] {
  return validateKnownKeys(args, '', []);
}

/**
 * Tool handler mapping - maps tool names to core operations
 */
export const toolHandlers: Record<string, ToolHandler> = {
  compose_document: async (args, s) => {
    const errors = validateComposeArgs(args);
    if (errors.length > 0) {
      return createValidationErrorResponse(errors);
    }

    const blocks = Array.isArray(args.blocks) ? args.blocks.filter(isRecord).map(toBlock) : [];
    const doc = new RtfDocument(createDefaultTemplate(s.logger), {
      title: stringArg(args, 'title'),
      author: stringArg(args, 'author') ?? s.config.defaultAuthor,
      filename: stringArg(args, 'filename'),
      footnotes: toFootnoteOptions(args.footnotes),
      paragraphStyle: stringArg(args, 'paragraph_style'),
      footnoteStyle: stringArg(args, 'footnote_style'),
      logger: s.logger,
      writer: s.writer,
    });
    doc.setLayout(stringArg(args, 'layout') ?? s.config.defaultLayout, toLayoutOverrides(args.layout_overrides));

    let paragraphs = 0;
    let footnotes = 0;
    for (const block of blocks) {
      switch (block.type) {
        case 'paragraph':
          doc.openParagraph(block.text, block.style);
          paragraphs++;
          break;
        case 'text':
          doc.addText(block.text, block.format);
          break;
        case 'footnote':
          doc.openFootnote(block.text, block.style, block.anchor);
          footnotes++;
          break;
        case 'close_footnote':
          doc.closeFootnote();
          break;
        case 'close_paragraph':
          doc.closeParagraph();
          break;
      }
    }

    if (booleanArg(args, 'save') === false) {
      return { rtf: doc.toRtf({ now: s.now }), paragraphs, footnotes };
    }

    const filePath = await doc.save({ folder: s.config.outputDir, now: s.now });
    return {
      path: path.relative(s.config.workspaceRoot, filePath) || filePath,
      paragraphs,
      footnotes,
    };
  },

  convert_length: async (args) => {
    const errors = [
      ...validateKnownKeys(args, '', ['value']),
      ...collectValidationErrors([() => validateLength(args.value, 'value')]),
    ];
    const value = args.value;
    if (errors.length > 0 || (typeof value !== 'string' && typeof value !== 'number')) {
      return createValidationErrorResponse(errors);
    }

    const twips = parseLength(value);
    return {
      twips,
      cm: formatLength(twips, 'cm'),
      inches: formatLength(twips, 'in'),
    };
  },

  encode_text: async (args) => {
    const errors = [
      ...validateKnownKeys(args, '', ['text']),
      ...collectValidationErrors([() => validateString(args.text, 'text')]),
    ];
    const text = stringArg(args, 'text');
    if (errors.length > 0 || text === undefined) {
      return createValidationErrorResponse(errors);
    }

    return { encoded: encodeRtfText(text) };
  },

  list_layout_presets: async (args) => {
    const errors = validateNoArgs(args);
    if (errors.length > 0) {
      return createValidationErrorResponse(errors);
    }

    return LAYOUT_PRESET_NAMES.map((name) => ({ name, ...getLayoutPreset(name) }));
  },

  list_styles: async (args, s) => {
    const errors = validateNoArgs(args);
    if (errors.length > 0) {
      return createValidationErrorResponse(errors);
    }

    return createDefaultTemplate(s.logger).styles.values().map((style) => ({
      id: style.id,
      name: style.name,
      basedOn: style.basedOn,
      next: style.next,
      attributes: style.attributes,
    }));
  },
};

/**
 * Handle tool call requests by delegating to the matching handler.
 * Failures come back as an ErrorResponse rather than a rejection.
 */
export async function handleToolCall(
  toolName: string,
  args: ToolArgs,
  services: Services
): Promise<unknown> {
  const handler = toolHandlers[toolName];
  if (!handler) {
    return toErrorResponse(new ConfigError(`Unknown tool: ${toolName}`, { tool: toolName }, [
      `Available tools: ${Object.keys(toolHandlers).join(', ')}`,
    ]));
  }

  try {
    return await handler(args, services);
  } catch (error) {
    const response: ErrorResponse = toErrorResponse(error);
    services.logger.error(
      `[handleToolCall] ${toolName} failed: ${response.message}`,
      error instanceof Error ? error : undefined
    );
    return response;
  }
}
