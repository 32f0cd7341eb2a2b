// src/contracts/contracts.module.ts
import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';
import { ContractsController } from './contracts.controller';

@Module({
  imports: [PipelineModule],
  controllers: [ContractsController],
})
export class ContractsModule {}
