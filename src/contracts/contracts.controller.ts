// src/contracts/contracts.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import { PipelineOrchestrator } from '../pipeline/pipeline-orchestrator.service';
import { IngestContractDto } from './dto/ingest-contract.dto';
import { QueryContractDto } from './dto/query-contract.dto';

/** The part of the HTTP response that tells whether the client went away. */
export interface DisconnectSource {
  once(event: 'close', listener: () => void): unknown;
  readonly writableFinished: boolean;
}

/** Aborts when the client disconnects before the response has been written. */
function abortOnDisconnect(res: DisconnectSource): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

@Controller('contracts')
export class ContractsController {
  constructor(private readonly orchestrator: PipelineOrchestrator) {}

  @Post()
  async ingest(@Body() body: IngestContractDto, @Res({ passthrough: true }) res: DisconnectSource) {
    return this.orchestrator.ingestDocument(
      { id: body.documentId, text: body.text },
      { force: body.force ?? false, signal: abortOnDisconnect(res) },
    );
  }

  @Get()
  list() {
    return this.orchestrator.listIndexes();
  }

  @Get(':documentId')
  get(@Param('documentId') documentId: string) {
    const index = this.orchestrator.getIndex(documentId);
    if (!index) throw new NotFoundException(`Document "${documentId}" has not been indexed`);
    return index;
  }

  @Delete(':documentId')
  evict(@Param('documentId') documentId: string) {
    if (!this.orchestrator.evictIndex(documentId)) {
      throw new NotFoundException(`Document "${documentId}" has not been indexed`);
    }
    return { documentId, evicted: true };
  }

  @Post(':documentId/query')
  @HttpCode(200)
  async query(
    @Param('documentId') documentId: string,
    @Body() body: QueryContractDto,
    @Res({ passthrough: true }) res: DisconnectSource,
  ) {
    const result = await this.orchestrator.answerQuery(
      documentId,
      { text: body.question, topK: body.topK },
      { signal: abortOnDisconnect(res) },
    );
    return result.answer;
  }
}
