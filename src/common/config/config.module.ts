import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { configValidation } from './config.validation';
import { pipelineConfigProvider, PIPELINE_CONFIG } from './pipeline.config';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: configValidation,
      cache: true,
    }),
  ],
  providers: [pipelineConfigProvider],
  exports: [NestConfigModule, PIPELINE_CONFIG],
})
export class ConfigModule {}
