import { Module } from '@nestjs/common';
import { ClauseTextCleaner } from './cleaners/clause-text-cleaner';

export const CLEANER = Symbol('CLEANER');

@Module({
  providers: [
    {
      provide: CLEANER,
      useFactory: () => new ClauseTextCleaner(),
    },
  ],
  exports: [CLEANER],
})
export class CleaningModule {}
