// src/contracts/dto/query-contract.dto.ts
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';

export class QueryContractDto {
  @IsString()
  @IsNotEmpty()
  question!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  topK?: number;
}
