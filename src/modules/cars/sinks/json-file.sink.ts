/**
 * JSON File Sink
 * Dumps a batch to dumps/cars_dump_YYYYMMDD_HHMMSS.json
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../../lib/logger';
import { CarRecord, toCarJson } from '../car.types';
import { RecordSink, SinkResult } from './sink.types';

const log = createLogger('JsonFileSink');

export interface JsonFileSinkOptions {
  dumpsDir: string;
  indent?: number;
  clock?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local-time YYYYMMDD_HHMMSS
 */
export function formatDumpTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export class JsonFileSink implements RecordSink {
  readonly name = 'json';
  private readonly dumpsDir: string;
  private readonly indent: number;
  private readonly clock: () => Date;

  constructor(options: JsonFileSinkOptions) {
    this.dumpsDir = options.dumpsDir;
    this.indent = options.indent ?? 2;
    this.clock = options.clock ?? (() => new Date());
  }

  async write(records: CarRecord[]): Promise<SinkResult> {
    if (records.length === 0) {
      return { sink: this.name, written: 0 };
    }

    const filePath = path.join(this.dumpsDir, `cars_dump_${formatDumpTimestamp(this.clock())}.json`);

    try {
      await fs.mkdir(this.dumpsDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(records.map(toCarJson), null, this.indent), 'utf-8');
    } catch (error) {
      log.error(`Failed to write ${filePath}:`, error);
      return { sink: this.name, written: 0 };
    }

    log.info(`Saved ${records.length} car(s) to ${filePath}`);
    return { sink: this.name, written: records.length, location: filePath };
  }
}
