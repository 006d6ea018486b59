import { Module } from '@nestjs/common';

// Common modules
import { ConfigModule } from './common/config/config.module';
import { LoggerModule } from './common/services/logger.module';
import { StorageModule } from './common/storage/storage.module';

// App modules
import { PipelineModule } from './app/pipeline/pipeline.module';

@Module({
  imports: [
    // Configuration
    ConfigModule,

    // Logging (must be early to capture startup logs)
    LoggerModule,

    // Local bronze/silver/gold storage
    StorageModule,

    PipelineModule,
  ],
})
export class AppModule {}
