/**
 * OpenAI-backed Semantic Validator
 *
 * Single-shot: the SDK's own retries are disabled and a failure is reported
 * to the matching stage, which falls back to lexical-only matches.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { MalformedValidatorResponseError, ValidatorUnavailableError } from '../errors';
import { renderTemplate } from '../templates/types';
import type { PromptTemplate } from '../templates/types';
import {
  SEMANTIC_VALIDATION_TEMPLATE,
  SEMANTIC_VALIDATION_SCHEMA,
} from '../templates/semantic-validation.template';
import type { SemanticValidationRequest, SemanticValidator } from './types';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  schema: typeof SEMANTIC_VALIDATION_SCHEMA;
}

export interface ChatCompletionReply {
  id: string | null;
  content: string | null;
  totalTokens: number | null;
}

/**
 * The one call the validator needs from a chat-completion backend.
 */
export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<ChatCompletionReply>;
}

export interface OpenAiClientOptions {
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * ChatCompletionClient over the OpenAI SDK, with JSON-schema structured output.
 */
export function createOpenAiChatClient(options: OpenAiClientOptions = {}): ChatCompletionClient {
  const openai = new OpenAI({
    apiKey: options.apiKey || config.openaiApiKey,
    timeout: options.timeoutMs || config.llmRequestTimeoutMs,
    maxRetries: 0, // One call per document; failures fall back to lexical matches
  });

  return {
    async complete(request: ChatCompletionRequest): Promise<ChatCompletionReply> {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages,
        response_format: {
          type: 'json_schema',
          json_schema: request.schema,
        },
        temperature: 0,
      });
      return {
        id: response.id || null,
        content: response.choices[0]?.message?.content ?? null,
        totalTokens: response.usage?.total_tokens ?? null,
      };
    },
  };
}

function formatCandidates(request: SemanticValidationRequest): string {
  if (request.lexical_matches.length === 0) return 'No lexical candidates.';
  return request.lexical_matches
    .map(
      (m, i) =>
        `Candidate ${i + 1}: ${request.catalog_subset.find((e) => e.id === m.catalog_id)?.name ?? m.catalog_id} ` +
        `(id: ${m.catalog_id}, score: ${m.score.toFixed(2)})\n  Text: "${m.text_span}"`
    )
    .join('\n');
}

function formatFragments(request: SemanticValidationRequest): string {
  if (request.unmatched_fragments.length === 0) return 'No unmatched fragments.';
  return request.unmatched_fragments.map((f) => `- ${f}`).join('\n');
}

function formatCatalog(request: SemanticValidationRequest): string {
  return request.catalog_subset
    .map((e) => `id: ${e.id} | name: ${e.name} | description: ${e.description || 'N/A'}`)
    .join('\n');
}

export function buildValidationPrompt(
  request: SemanticValidationRequest,
  template: PromptTemplate = SEMANTIC_VALIDATION_TEMPLATE
): ChatMessage[] {
  return [
    { role: 'system', content: template.systemPrompt },
    {
      role: 'user',
      content: renderTemplate(template.userPromptTemplate, {
        document_text: request.document_text,
        lexical_matches: formatCandidates(request),
        unmatched_fragments: formatFragments(request),
        catalog: formatCatalog(request),
      }),
    },
  ];
}

export interface OpenAiSemanticValidatorOptions {
  model?: string;
  template?: PromptTemplate;
}

export class OpenAiSemanticValidator implements SemanticValidator {
  readonly name = 'openai';
  private readonly model: string;
  private readonly template: PromptTemplate;

  constructor(
    private readonly client: ChatCompletionClient,
    options: OpenAiSemanticValidatorOptions = {}
  ) {
    this.model = options.model || config.llmModel;
    this.template = options.template ?? SEMANTIC_VALIDATION_TEMPLATE;
  }

  async validate(request: SemanticValidationRequest): Promise<unknown> {
    const startTime = Date.now();
    let reply: ChatCompletionReply;

    try {
      reply = await this.client.complete({
        model: this.model,
        messages: buildValidationPrompt(request, this.template),
        schema: SEMANTIC_VALIDATION_SCHEMA,
      });
    } catch (error) {
      throw new ValidatorUnavailableError('Semantic validation request failed', error);
    }

    logger.info('Semantic validation complete', {
      model: this.model,
      template: `${this.template.name}@${this.template.version}`,
      request_id: reply.id,
      duration_ms: Date.now() - startTime,
      tokens_used: reply.totalTokens,
    });

    if (!reply.content) {
      throw new ValidatorUnavailableError('Empty response from semantic validator');
    }

    try {
      const parsed: unknown = JSON.parse(reply.content);
      return parsed;
    } catch (error) {
      throw new MalformedValidatorResponseError([
        `response is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
  }
}
