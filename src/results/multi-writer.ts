import type { OutputStream } from '../utils/logger.js';
import type { ResultSink } from './result-writer.js';

export interface ReportTarget {
  write(data: string): Promise<void>;
}

/**
 * Resolves once the stream has flushed the chunk. A failure reported through
 * the write callback or an `error` event rejects; the `error` listener stays
 * attached after a failed write so the event that follows it is not unhandled.
 */
export function streamTarget(stream: OutputStream): ReportTarget {
  return {
    write(data) {
      return new Promise<void>((resolve, reject) => {
        const onError = (err: Error): void => reject(err);
        stream.once?.('error', onError);
        stream.write(data, (err) => {
          if (err) {
            reject(err);
            return;
          }
          stream.off?.('error', onError);
          resolve();
        });
      });
    },
  };
}

export function sinkTarget(sink: ResultSink): ReportTarget {
  return { write: (data) => sink.write(data) };
}

/**
 * Duplicates each write across every target, in order. Stops at the first
 * target that fails and rethrows its error; later targets are not written.
 */
export class MultiWriter implements ReportTarget {
  private readonly targets: ReportTarget[];

  constructor(...targets: ReportTarget[]) {
    this.targets = targets;
  }

  async write(data: string): Promise<void> {
    for (const target of this.targets) {
      await target.write(data);
    }
  }
}
