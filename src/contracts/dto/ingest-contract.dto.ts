// src/contracts/dto/ingest-contract.dto.ts
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

export class IngestContractDto {
  @IsString()
  @Matches(/^[A-Za-z0-9._-]+$/, {
    message: 'documentId may only contain letters, digits, ".", "_" and "-"',
  })
  @MaxLength(128)
  documentId!: string;

  @IsString()
  @IsNotEmpty()
  text!: string;

  @IsOptional()
  @IsBoolean()
  force?: boolean; // rebuild even when the content hash is unchanged
}
