// src/validation/dto/candidate-answer.dto.ts
import { Type } from 'class-transformer';
import { IsArray, IsDefined, IsNotEmpty, IsString, ValidateNested } from 'class-validator';
import type { CandidateAnswer, SupportingClause } from '../answer.types';

export class SupportingClauseDto implements SupportingClause {
  @IsDefined()
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsDefined()
  @IsString()
  @IsNotEmpty()
  text!: string;
}

export class CandidateAnswerDto implements CandidateAnswer {
  @IsDefined()
  @IsString()
  @IsNotEmpty()
  summary!: string;

  @IsDefined()
  @IsArray()
  @IsString({ each: true })
  obligations!: string[];

  @IsDefined()
  @IsArray()
  @IsString({ each: true })
  penalties!: string[];

  @IsDefined()
  @IsArray()
  @IsString({ each: true })
  risks!: string[];

  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SupportingClauseDto)
  supporting_clauses!: SupportingClauseDto[];
}
