/**
 * Store Sink
 * Bulk transactional insert of a batch
 */

import { createLogger } from '../../../lib/logger';
import { CarRecord, CarStore } from '../car.types';
import { RecordSink, SinkResult } from './sink.types';

const log = createLogger('StoreSink');

export class StoreSink implements RecordSink {
  readonly name = 'store';

  constructor(private readonly store: Pick<CarStore, 'insertBatch'>) {}

  async write(records: CarRecord[]): Promise<SinkResult> {
    if (records.length === 0) {
      return { sink: this.name, written: 0 };
    }

    try {
      const written = await this.store.insertBatch(records);
      log.info(`Inserted ${written} car(s)`);
      return { sink: this.name, written };
    } catch (error) {
      // The transaction rolled back; the whole batch is lost for this run
      log.error(`Insert failed, dropping batch of ${records.length} car(s):`, error);
      return { sink: this.name, written: 0 };
    }
  }
}
