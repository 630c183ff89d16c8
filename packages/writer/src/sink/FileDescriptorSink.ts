import { writeSync } from "node:fs";
import type { JsonSink } from "@jsonstream/core/contract";

/**
 * Writes each chunk synchronously to an open file descriptor, such as
 * `process.stdout.fd` or one returned by `fs.openSync`. Short writes are
 * retried until the whole chunk is out.
 */
export class FileDescriptorSink implements JsonSink {
  constructor(
    private readonly fd: number,
    private readonly encoding: BufferEncoding = "utf-8"
  ) {}

  write(chunk: string): void {
    const bytes = Buffer.from(chunk, this.encoding);
    let offset = 0;
    while (offset < bytes.length) {
      const written = writeSync(this.fd, bytes, offset, bytes.length - offset);
      if (written <= 0) {
        throw new Error(
          `File descriptor ${this.fd} accepted no bytes (${offset} of ${bytes.length} written)`
        );
      }
      offset += written;
    }
  }
}
