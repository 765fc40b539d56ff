import { ConfigError } from '../errors/index.js';
import type { ColorOptions } from '../types/index.js';
import { getLogger, type LoggingService } from '../services/LoggingService.js';
import { ResourceTable } from './ResourceTable.js';

const COLOR_ID = /^\d+$/;

function component(value: number | undefined, field: string, id: string): number {
  const v = value ?? 0;
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new ConfigError(`Color "${id}": ${field} must be an integer between 0 and 255`, {
      id,
      [field]: v,
    });
  }
  return v;
}

/**
 * Color table entry. The id is the index that `\cf` refers to.
 */
export class Color {
  readonly id: string;
  readonly red: number;
  readonly green: number;
  readonly blue: number;

  constructor(options: ColorOptions) {
    if (!COLOR_ID.test(options.id)) {
      throw new ConfigError(`Invalid color id "${options.id}"`, { id: options.id }, [
        'Color ids are decimal numbers (e.g. "1")',
      ]);
    }
    this.id = options.id;
    this.red = component(options.red, 'red', options.id);
    this.green = component(options.green, 'green', options.id);
    this.blue = component(options.blue, 'blue', options.id);
  }

  render(): string {
    return `\\red${this.red}\\green${this.green}\\blue${this.blue};\n`;
  }
}

export class ColorTable extends ResourceTable<Color> {
  constructor(logger: LoggingService = getLogger()) {
    super('ColorTable', logger);
  }
}
