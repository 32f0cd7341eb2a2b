// src/contracts/ask.cli.ts
import 'reflect-metadata';
import { readFile } from 'fs/promises';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { PipelineOrchestrator } from '../pipeline/pipeline-orchestrator.service';
import { isPipelineError } from '../shared/errors/pipeline.errors';
import { renderAnswerReport } from './answer-report';
import { parseAskArgs } from './ask-args';

async function main() {
  const parsed = parseAskArgs(process.argv);
  if (!parsed.ok) {
    console.error(parsed.error);
    process.exit(2);
  }
  const { file, question, documentId, topK, format } = parsed.args;

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const orchestrator = app.get(PipelineOrchestrator);

    const text = await readFile(file, 'utf8');
    await orchestrator.ingestDocument({ id: documentId, text }, { signal: controller.signal });
    const result = await orchestrator.answerQuery(
      documentId,
      { text: question, topK },
      { signal: controller.signal },
    );

    if (format === 'markdown') {
      process.stdout.write(renderAnswerReport(result));
    } else {
      process.stdout.write(JSON.stringify(result.answer, null, 2) + '\n');
    }

    await app.close();
    process.exit(0);
  } catch (e) {
    console.error(isPipelineError(e) ? JSON.stringify(e.toJSON()) : e);
    await app.close();
    process.exit(1);
  }
}

void main();
