import { Module } from '@nestjs/common';
import { DimensionalModelerService } from './dimensional-modeler.service';
import { GoldWriterService } from './gold-writer.service';

/**
 * Model Module
 * Builds the gold star schema and publishes it for BI tools
 */
@Module({
  providers: [DimensionalModelerService, GoldWriterService],
  exports: [DimensionalModelerService, GoldWriterService],
})
export class ModelModule {}
