import * as crypto from 'crypto';
import * as fs from 'fs';

/**
 * Atomic file writes using the tmp-file-then-rename pattern.
 *
 * A reader that opens the target path sees either nothing or the complete
 * content, never a partial write.
 */
export class AtomicFileWriter {
  /**
   * Unique sibling path for the intermediate write.
   */
  private static getTempPath(filePath: string): string {
    return `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  }

  /**
   * Write text to a file atomically.
   *
   * @param filePath - Target file path
   * @param data - Text to write
   * @param options - Write options
   * @throws Error if the write or rename fails (the temp file is removed)
   */
  static async writeAsync(
    filePath: string,
    data: string,
    options: { encoding?: BufferEncoding; mode?: number } = {}
  ): Promise<void> {
    const tmpPath = this.getTempPath(filePath);

    try {
      await fs.promises.writeFile(tmpPath, data, {
        encoding: options.encoding ?? 'utf-8',
        ...(options.mode !== undefined && { mode: options.mode }),
      });
      await fs.promises.rename(tmpPath, filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
