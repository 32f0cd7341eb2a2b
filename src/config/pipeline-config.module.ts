// src/config/pipeline-config.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import pipelineConfig, { PIPELINE_CONFIG, PipelineConfig } from './pipeline.config';

@Global()
@Module({
  imports: [ConfigModule.forFeature(pipelineConfig)],
  providers: [
    {
      provide: PIPELINE_CONFIG,
      inject: [pipelineConfig.KEY],
      useFactory: (config: ConfigType<typeof pipelineConfig>): PipelineConfig => config,
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
