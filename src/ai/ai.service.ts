// src/ai/ai.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
  ChatCompletionToolMessageParam,
} from 'openai/resources/chat/completions';
import { AiUsageService } from './ai-usage.service';
import { CompletionRequest, GenerationService, ToolDescriptor } from './ai.types';
import { PIPELINE_CONFIG, type PipelineConfig } from '../config/pipeline.config';
import { GenerationServiceError, errorMessage } from '../shared/errors/pipeline.errors';

function toChatTool(tool: ToolDescriptor): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === 'object' && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

/**
 * Chat-completions client used by the evidence-constrained generator.
 *
 * Answers are requested in JSON-object mode. When tools are supplied the model
 * may call them for up to `maxToolRounds` rounds before it must answer.
 * Retries are not done here: the orchestrator owns the retry policy.
 */
@Injectable()
export class AiService implements GenerationService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    if (!process.env.OPENAI_API_KEY) {
      throw new GenerationServiceError('OPENAI_API_KEY is not set');
    }

    const tools = request.tools ?? [];
    const toolsByName = new Map(tools.map((t) => [t.name, t]));
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.system },
      { role: 'user', content: request.user },
    ];

    for (let round = 0; ; round++) {
      const allowTools = tools.length > 0 && round < this.config.maxToolRounds;

      let res: OpenAI.Chat.Completions.ChatCompletion;
      try {
        res = await this.openai.chat.completions.create(
          {
            model: this.config.chatModel,
            messages,
            temperature: 0,
            response_format: { type: 'json_object' },
            ...(allowTools
              ? { tools: tools.map(toChatTool), tool_choice: 'auto' as const }
              : {}),
          },
          { signal: request.signal },
        );
      } catch (error: unknown) {
        this.aiUsage.record({
          kind: 'completion_error',
          model: this.config.chatModel,
          inputTokens: 0,
          outputTokens: 0,
          totalTokens: 0,
          costUsd: null,
          extra: { round, message: errorMessage(error).slice(0, 500) },
        });
        this.logger.error(
          `Error while calling OpenAI (complete): ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
        throw new GenerationServiceError(
          `Generation service call failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }

      const message = res.choices?.[0]?.message;
      const toolCalls: ChatCompletionMessageToolCall[] = message?.tool_calls ?? [];

      // 🔢 metering
      const usage = res.usage;
      if (usage) {
        const promptTokens = usage.prompt_tokens ?? 0;
        const completionTokens = usage.completion_tokens ?? 0;
        this.aiUsage.record({
          kind: toolCalls.length ? 'tool_round' : 'completion',
          model: this.config.chatModel,
          inputTokens: promptTokens,
          outputTokens: completionTokens,
          totalTokens: usage.total_tokens ?? promptTokens + completionTokens,
          costUsd: this.aiUsage.computeCostUsd(
            this.config.chatModel,
            promptTokens,
            completionTokens,
          ),
          extra: { round, toolCalls: toolCalls.length },
        });
      }

      if (message && allowTools && toolCalls.length > 0) {
        messages.push(message);
        const results = await Promise.all(
          toolCalls.map(
            async (call): Promise<ChatCompletionToolMessageParam> => {
              const tool = toolsByName.get(call.function.name);
              const output = tool
                ? await tool.invoke(parseToolArguments(call.function.arguments), request.signal)
                : null;
              return {
                role: 'tool',
                tool_call_id: call.id,
                content: JSON.stringify(output ?? null),
              };
            },
          ),
        );
        messages.push(...results);
        continue;
      }

      const content = message?.content?.trim();
      if (!content) {
        throw new GenerationServiceError('Generation service returned an empty completion');
      }

      this.logger.debug(`Completion received after ${round + 1} round(s), ${content.length} chars`);
      return content;
    }
  }
}
