import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogger, type LoggingService } from '../services/LoggingService.js';

export const RTF_EXTENSION = '.rtf';

export interface WriteTarget {
  filename: string;              // Without extension
  folder?: string;
}

/**
 * Writes finalized RTF to disk. File system errors propagate to the caller.
 */
export class RtfFileWriter {
  constructor(private readonly logger: LoggingService = getLogger()) {}

  /**
   * Resolve `<folder>/<filename>.rtf`
   */
  resolvePath(target: WriteTarget): string {
    const file = target.filename + RTF_EXTENSION;
    return target.folder ? path.join(target.folder, file) : file;
  }

  /**
   * Write the content, creating the folder if needed.
   *
   * @returns The path written
   */
  async write(content: string, target: WriteTarget): Promise<string> {
    const filePath = this.resolvePath(target);
    const dir = path.dirname(filePath);

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');

    this.logger.debug(`[RtfFileWriter] Wrote ${content.length} characters to ${filePath}`);
    return filePath;
  }
}
