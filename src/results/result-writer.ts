import { open } from 'node:fs/promises';

/** An open destination for a rendered report. */
export interface ResultSink {
  write(data: string): Promise<void>;
  close(): Promise<void>;
}

export interface ResultWriter {
  openFile(path: string): Promise<ResultSink>;
}

/** Opens result files on disk, truncating whatever was there. */
export class FileResultWriter implements ResultWriter {
  async openFile(path: string): Promise<ResultSink> {
    const handle = await open(path, 'w', 0o600);
    let closed = false;
    return {
      async write(data) {
        await handle.write(data);
      },
      async close() {
        if (closed) return;
        closed = true;
        await handle.close();
      },
    };
  }
}
