import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { IngestContractDto } from './ingest-contract.dto';
import { QueryContractDto } from './query-contract.dto';

const failedProperties = (errors: ReturnType<typeof validateSync>) => errors.map((e) => e.property);

describe('contract DTOs', () => {
  it('accepts a valid ingest body', () => {
    const dto = plainToInstance(IngestContractDto, { documentId: 'msa-2024_v1.2', text: 'Fees are due.', force: true });

    expect(validateSync(dto)).toEqual([]);
  });

  it('rejects document ids with unsafe characters and empty text', () => {
    const dto = plainToInstance(IngestContractDto, { documentId: 'msa 2024/1', text: '' });

    expect(failedProperties(validateSync(dto))).toEqual(['documentId', 'text']);
  });

  it('bounds topK', () => {
    expect(validateSync(plainToInstance(QueryContractDto, { question: 'Q?' }))).toEqual([]);
    expect(failedProperties(validateSync(plainToInstance(QueryContractDto, { question: 'Q?', topK: 0 })))).toEqual(['topK']);
    expect(failedProperties(validateSync(plainToInstance(QueryContractDto, { question: 'Q?', topK: 51 })))).toEqual(['topK']);
    expect(failedProperties(validateSync(plainToInstance(QueryContractDto, { question: '', topK: 1.5 })))).toEqual([
      'question',
      'topK',
    ]);
  });
});
