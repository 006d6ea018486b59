import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { PipelineService } from './app/pipeline/pipeline.service';

async function bootstrap() {
  // Standalone context: the pipeline runs once, no HTTP server
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  try {
    const result = await app.get(PipelineService).run();
    logger.log(
      `✅ Pipeline finished in ${result.duration}ms: ${result.bronze.recordCount} bronze, ${result.silver.stats.outputRows} silver, ${result.gold.fact_breweries.rows} facts`,
    );
  } finally {
    await app.close();
  }
}

bootstrap()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('❌ Pipeline failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
