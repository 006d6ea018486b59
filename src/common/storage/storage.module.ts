import { Global, Module } from '@nestjs/common';
import { FileStorageService } from './file-storage.service';
import { ParquetStorageService } from './parquet-storage.service';

@Global()
@Module({
  providers: [FileStorageService, ParquetStorageService],
  exports: [FileStorageService, ParquetStorageService],
})
export class StorageModule {}
