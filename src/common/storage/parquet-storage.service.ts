import { Injectable } from '@nestjs/common';
import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { PipelineStageName } from '../errors/pipeline.errors';
import { FileStorageService } from './file-storage.service';

@Injectable()
export class ParquetStorageService {
  constructor(private readonly files: FileStorageService) {}

  /**
   * Write `rows` as one Parquet file, published atomically.
   * Null and undefined values are left out so optional columns read back as absent.
   */
  async write<T extends object>(
    stage: PipelineStageName,
    target: string,
    schema: ParquetSchema,
    rows: readonly T[],
  ): Promise<void> {
    await this.files.writeAtomic(stage, [target], async ([file]) => {
      const writer = await ParquetWriter.openFile(schema, file.temp);
      try {
        for (const row of rows) {
          await writer.appendRow(
            Object.fromEntries(
              Object.entries(row).filter(
                ([, value]) => value !== null && value !== undefined,
              ),
            ),
          );
        }
      } finally {
        await writer.close();
      }
    });
  }

  /** Read every row of a Parquet file; rows are returned unvalidated. */
  async read(source: string): Promise<unknown[]> {
    const reader = await ParquetReader.openFile(source);
    try {
      const cursor = reader.getCursor();
      const rows: unknown[] = [];
      let record: unknown = await cursor.next();
      while (record) {
        rows.push(record);
        record = await cursor.next();
      }
      return rows;
    } finally {
      await reader.close();
    }
  }
}
