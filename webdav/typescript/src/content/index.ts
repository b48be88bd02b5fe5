/**
 * In-memory file content returned by downloads.
 * @module content
 */

import { Readable } from 'stream';

/**
 * Downloaded bytes held in memory, optionally carrying the remote file name.
 */
export class ContentFile {
  public readonly name?: string;
  private readonly content: Buffer;

  constructor(content: Buffer | Uint8Array | string, name?: string) {
    this.content = Buffer.isBuffer(content) ? content : Buffer.from(content);
    this.name = name;
  }

  /**
   * Size in bytes.
   */
  get size(): number {
    return this.content.length;
  }

  /**
   * The raw bytes.
   */
  read(): Buffer {
    return this.content;
  }

  /**
   * Decodes the bytes as text.
   */
  text(encoding: BufferEncoding = 'utf8'): string {
    return this.content.toString(encoding);
  }

  /**
   * A fresh stream over the bytes.
   */
  toReadable(): Readable {
    return Readable.from([this.content]);
  }
}
