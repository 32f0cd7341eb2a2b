import { Global, Module } from '@nestjs/common';
import { LokiLoggerService } from './loki-logger.service';
import { LOGGER_SERVICE } from '../../types';

@Global()
@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      useValue: process.env.JOB_NAME || 'contract-qa',
    },
    {
      provide: 'APP_NAME',
      useValue: process.env.APP_NAME || 'contract-qa-pipeline',
    },
    LokiLoggerService,
    {
      provide: LOGGER_SERVICE,
      useExisting: LokiLoggerService,
    },
  ],
  exports: [
    LOGGER_SERVICE, // main abstraction
    LokiLoggerService,
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
