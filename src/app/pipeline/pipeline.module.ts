import { Module } from '@nestjs/common';
import { ExtractModule } from '../extract/extract.module';
import { ModelModule } from '../model/model.module';
import { TransformModule } from '../transform/transform.module';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [ExtractModule, TransformModule, ModelModule],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
