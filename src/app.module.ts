// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PipelineConfigModule } from './config/pipeline-config.module';
import { ContractsModule } from './contracts/contracts.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { LoggingModule } from './shared/lib/logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    PipelineConfigModule,
    LoggingModule,
    PipelineModule,
    ContractsModule,
  ],
})
export class AppModule {}
