/**
 * OpenAI Extraction Service
 *
 * ExtractionService backed by OpenAI chat completions with JSON-schema
 * structured outputs. SDK retries are disabled: the orchestrator owns retry
 * policy and the adapter owns the timeout.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { CallServiceError, CallTimeoutError, MalformedResponseError } from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import type { ExtractionRequest, ExtractionService } from './service';

/**
 * JSON Schema for OpenAI Structured Outputs. Values come back as strings;
 * docs/contracts/pass_response.schema.json is the wider contract the
 * adapter validates against.
 */
const PASS_RESPONSE_FORMAT = {
  name: 'lease_pass_extraction',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['fields', 'warnings'],
    properties: {
      fields: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['name', 'value', 'excerpt', 'confidence', 'category'],
          properties: {
            name: { type: 'string' },
            value: { type: 'string' },
            excerpt: { type: 'string' },
            confidence: { type: 'number' },
            category: {
              type: 'string',
              enum: [
                'financial',
                'parties',
                'premises',
                'term',
                'use',
                'maintenance',
                'assignment',
                'insurance',
                'default',
                'signature',
                'unclassified',
              ],
            },
          },
        },
      },
      warnings: {
        type: 'array',
        items: { type: 'string' },
      },
    },
  },
};

export interface OpenAiExtractionServiceOptions {
  apiKey?: string;
  model?: string;
  /** Upper bound for the HTTP request; the adapter's pass timeout is normally shorter. */
  requestTimeoutMs?: number;
}

function isRetryableStatus(status: number | undefined): boolean {
  return status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
}

export class OpenAiExtractionService implements ExtractionService {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiExtractionServiceOptions = {}) {
    this.model = options.model || config.llmModel;
    this.client = new OpenAI({
      apiKey: options.apiKey || config.openaiApiKey,
      timeout: options.requestTimeoutMs || config.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<unknown> {
    const startTime = Date.now();
    const endTimer = llmRequestDurationHistogram.startTimer({ model: this.model });

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          response_format: { type: 'json_schema', json_schema: PASS_RESPONSE_FORMAT },
          temperature: 0,
        },
        { signal }
      );
      content = response.choices[0]?.message?.content;
      llmRequestsCounter.inc({ model: this.model, status: 'success' });
    } catch (error) {
      llmRequestsCounter.inc({ model: this.model, status: 'error' });
      throw this.mapError(error, request);
    } finally {
      endTimer();
    }

    logger.debug('LLM pass extraction completed', {
      model: this.model,
      segmentId: request.segmentId,
      pass: request.passName,
      durationMs: Date.now() - startTime,
      textChars: request.textChars,
    });

    if (!content) {
      throw new MalformedResponseError('Empty response from LLM');
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new MalformedResponseError(
        `LLM response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private mapError(error: unknown, request: ExtractionRequest): Error {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new CallTimeoutError(`LLM request for ${request.segmentId} timed out`, config.llmRequestTimeoutMs);
    }
    if (error instanceof OpenAI.APIUserAbortError) {
      return new CallTimeoutError(`LLM request for ${request.segmentId} was aborted`, 0);
    }
    if (error instanceof OpenAI.APIError) {
      return new CallServiceError(error.message, isRetryableStatus(error.status), error.status);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
