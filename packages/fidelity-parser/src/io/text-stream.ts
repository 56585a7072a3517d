import { openSync, readSync, closeSync } from 'fs';
import type { ClosableTextStream, RewindableTextStream } from '@tradeledger/types';

const READ_CHUNK_BYTES = 64 * 1024;

/** In-memory stream, mostly for tests and piped input. */
export class StringTextStream implements RewindableTextStream {
  private position = 0;

  constructor(private readonly content: string) {}

  rewind(): void {
    this.position = 0;
  }

  read(): string {
    const rest = this.content.slice(this.position);
    this.position = this.content.length;
    return rest;
  }
}

/**
 * Stream over a file descriptor. Reads are positional, so rewinding never
 * reopens the file; the descriptor stays open until close().
 */
export class FileTextStream implements ClosableTextStream {
  private fd: number | null;
  private position = 0;

  constructor(
    readonly path: string,
    private readonly encoding: BufferEncoding = 'utf8'
  ) {
    this.fd = openSync(path, 'r');
  }

  rewind(): void {
    this.openDescriptor();
    this.position = 0;
  }

  read(): string {
    const fd = this.openDescriptor();
    const chunks: Buffer[] = [];
    const buffer = Buffer.alloc(READ_CHUNK_BYTES);

    for (;;) {
      const bytesRead = readSync(fd, buffer, 0, buffer.length, this.position);
      if (bytesRead === 0) {
        break;
      }
      chunks.push(Buffer.from(buffer.subarray(0, bytesRead)));
      this.position += bytesRead;
    }

    return Buffer.concat(chunks).toString(this.encoding);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  private openDescriptor(): number {
    if (this.fd === null) {
      throw new Error(`Stream is closed: ${this.path}`);
    }
    return this.fd;
  }
}
