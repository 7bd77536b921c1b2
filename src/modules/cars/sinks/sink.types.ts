/**
 * Sink Types
 */

import { CarRecord } from '../car.types';

export interface SinkResult {
  sink: string;
  written: number;
  /** Where the batch ended up, for sinks that produce a file */
  location?: string;
}

/**
 * Destination of a finished crawl batch. Sinks report failures in the
 * result instead of throwing.
 */
export interface RecordSink {
  readonly name: string;
  write(records: CarRecord[]): Promise<SinkResult>;
}
