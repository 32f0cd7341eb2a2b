// src/validation/validation.module.ts
import { Module } from '@nestjs/common';
import { AnswerValidator } from './answer-validator.service';

@Module({
  providers: [AnswerValidator],
  exports: [AnswerValidator],
})
export class ValidationModule {}
