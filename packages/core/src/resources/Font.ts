import { ConfigError } from '../errors/index.js';
import type { FontFamily, FontOptions, FontPitch } from '../types/index.js';
import { getLogger, type LoggingService } from '../services/LoggingService.js';
import { ResourceTable } from './ResourceTable.js';

const FONT_ID = /^f\d+$/;

/**
 * Font table entry
 */
export class Font {
  readonly id: string;
  readonly name: string;
  readonly family: FontFamily;
  readonly pitch?: FontPitch;
  readonly charset?: number;

  constructor(options: FontOptions) {
    if (!FONT_ID.test(options.id)) {
      throw new ConfigError(`Invalid font id "${options.id}"`, { id: options.id }, [
        'Font ids are "f" followed by a number (e.g. "f0")',
      ]);
    }
    if (options.charset !== undefined && (!Number.isInteger(options.charset) || options.charset < 0)) {
      throw new ConfigError(`Invalid charset for font "${options.id}"`, { charset: options.charset });
    }

    this.id = options.id;
    this.name = options.name;
    this.family = options.family ?? 'nil';
    this.pitch = options.pitch;
    this.charset = options.charset;
  }

  /**
   * Font table line, e.g. `{\f0\froman\fprq2 Times New Roman;}`
   */
  render(): string {
    let out = `{\\${this.id}\\f${this.family}`;
    if (this.pitch !== undefined) out += `\\fprq${this.pitch}`;
    if (this.charset !== undefined) out += `\\fcharset${this.charset}`;
    return `${out} ${this.name};}\n`;
  }
}

export class FontTable extends ResourceTable<Font> {
  constructor(logger: LoggingService = getLogger()) {
    super('FontTable', logger);
  }
}
