import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { BreweryApiCollectorService } from './collectors/brewery-api.collector';
import { BronzeWriterService } from './writers/bronze-writer.service';

/**
 * Extract Module
 * Fetches the paginated brewery listing and lands it as bronze
 */
@Module({
  imports: [HttpModule],
  providers: [BreweryApiCollectorService, BronzeWriterService],
  exports: [BreweryApiCollectorService, BronzeWriterService],
})
export class ExtractModule {}
