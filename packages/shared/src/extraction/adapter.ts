/**
 * Extraction Call Adapter
 *
 * Wraps one (segment, pass) call to the extraction service: bounds the text,
 * enforces the pass timeout, validates the payload and turns every outcome
 * into a frozen ExtractionResult. Never throws and never retries; retry
 * policy belongs to the orchestrator.
 */

import type { AdapterPolicy } from '../config';
import { deepFreeze } from '../config';
import {
  CallServiceError,
  CallTimeoutError,
  MalformedResponseError,
  errorMessage,
  isTransientServiceError,
} from '../errors';
import { logger } from '../logger';
import { normalizeFieldName } from '../aggregation/normalize';
import { validatePassResponse, type PassResponse } from '../schemas';
import { getTemplateForPass, renderTemplate } from '../templates';
import {
  isSegmentClassification,
  type CallFailure,
  type DocumentCategory,
  type ExtractedField,
  type ExtractionPass,
  type ExtractionResult,
  type ExtractionStatus,
  type PassContext,
  type Segment,
} from '../types';
import type { ExtractionRequest, ExtractionService } from './service';

const MAX_CONTEXT_LINES = 200;

export interface CallAdapter {
  call(segment: Segment, pass: ExtractionPass, priorContext: PassContext, attempt?: number): Promise<ExtractionResult>;
}

export interface ExtractionCallAdapterOptions {
  policy: AdapterPolicy;
  documentCategory: DocumentCategory;
}

export function truncateHead(text: string, maxChars: number): { text: string; truncated: boolean } {
  return text.length > maxChars ? { text: text.slice(0, maxChars), truncated: true } : { text, truncated: false };
}

export function formatPriorContext(context: PassContext): string {
  const entries = Object.entries(context.fields);
  if (entries.length === 0) return '(none)';
  const lines = entries.slice(0, MAX_CONTEXT_LINES).map(([key, value]) => `- ${key}: ${String(value)}`);
  if (entries.length > MAX_CONTEXT_LINES) {
    lines.push(`- ... ${entries.length - MAX_CONTEXT_LINES} more`);
  }
  return lines.join('\n');
}

function failureFor(error: unknown): { status: ExtractionStatus; failure: CallFailure } {
  if (error instanceof CallTimeoutError) {
    return { status: 'timeout', failure: { kind: 'CallTimeout', message: error.message, retryable: true } };
  }
  if (error instanceof MalformedResponseError) {
    return {
      status: 'malformed',
      failure: { kind: 'CallMalformedResponse', message: error.message, retryable: true },
    };
  }
  if (error instanceof CallServiceError) {
    return {
      status: 'serviceError',
      failure: { kind: 'CallServiceError', message: error.message, retryable: error.retryable },
    };
  }
  return {
    status: 'serviceError',
    failure: { kind: 'CallServiceError', message: errorMessage(error), retryable: isTransientServiceError(error) },
  };
}

export class ExtractionCallAdapter implements CallAdapter {
  constructor(
    private readonly service: ExtractionService,
    private readonly options: ExtractionCallAdapterOptions
  ) {}

  async call(
    segment: Segment,
    pass: ExtractionPass,
    priorContext: PassContext,
    attempt = 1
  ): Promise<ExtractionResult> {
    const startTime = Date.now();
    const { text, truncated } = truncateHead(segment.text, this.options.policy.maxCallChars);

    const base = {
      segmentId: segment.id,
      passName: pass.name,
      attempts: attempt,
      truncated,
    };

    if (text.trim().length === 0) {
      return deepFreeze<ExtractionResult>({
        ...base,
        status: 'skipped',
        fields: {},
        warnings: ['segment text is blank'],
        durationMs: 0,
      });
    }

    const request = this.buildRequest(segment, pass, priorContext, text);
    const timeoutMs = this.options.policy.passTimeoutsMs[pass.name];

    try {
      const payload = await this.dispatch(request, timeoutMs);
      const validation = validatePassResponse(payload);
      if (!validation.valid || !validation.value) {
        throw new MalformedResponseError(
          `Response failed schema validation: ${(validation.errors ?? []).slice(0, 3).join('; ')}`,
          validation.errors ?? []
        );
      }

      const fields = this.toFieldMap(validation.value, segment);
      return deepFreeze<ExtractionResult>({
        ...base,
        status: 'ok',
        fields,
        warnings: validation.value.warnings ?? [],
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      const { status, failure } = failureFor(error);
      logger.debug('Extraction call failed', {
        segmentId: segment.id,
        pass: pass.name,
        attempt,
        status,
        error: failure.message,
      });
      return deepFreeze<ExtractionResult>({
        ...base,
        status,
        fields: {},
        warnings: [],
        durationMs: Date.now() - startTime,
        error: failure,
      });
    }
  }

  private buildRequest(
    segment: Segment,
    pass: ExtractionPass,
    priorContext: PassContext,
    text: string
  ): ExtractionRequest {
    const template = getTemplateForPass(pass.name);
    const segmentText = segment.overlapText ? `[CONTEXT: ${segment.overlapText}]\n\n${text}` : text;
    const pages = segment.pageHint
      ? segment.pageHint.start === segment.pageHint.end
        ? String(segment.pageHint.start)
        : `${segment.pageHint.start}-${segment.pageHint.end}`
      : '(unknown)';

    return {
      segmentId: segment.id,
      passName: pass.name,
      systemPrompt: template.systemPrompt,
      userPrompt: renderTemplate(template.userPromptTemplate, {
        segment_id: segment.id,
        document_category: this.options.documentCategory,
        classification: segment.classification,
        heading: segment.heading ?? '(none)',
        pages,
        prior_context: formatPriorContext(priorContext),
        segment_text: segmentText,
      }),
      textChars: text.length,
    };
  }

  /**
   * Race the service against the pass timeout. On timeout the service's
   * signal is aborted.
   */
  private async dispatch(request: ExtractionRequest, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CallTimeoutError(`${request.passName} call for ${request.segmentId} exceeded ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.service.extract(request, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private toFieldMap(response: PassResponse, segment: Segment): Record<string, ExtractedField> {
    const fields: Record<string, ExtractedField> = {};
    for (const item of response.fields) {
      const name = normalizeFieldName(item.name);
      if (!name) continue;

      const category =
        isSegmentClassification(item.category) && item.category !== 'unclassified'
          ? item.category
          : segment.classification;
      const candidate: ExtractedField = {
        value: typeof item.value === 'string' ? item.value.trim() : item.value,
        excerpt: item.excerpt.trim(),
        confidence: Math.min(1, Math.max(0, item.confidence)),
        category,
      };

      const existing = fields[name];
      if (
        !existing ||
        candidate.confidence > existing.confidence ||
        (candidate.confidence === existing.confidence && candidate.excerpt.length > existing.excerpt.length)
      ) {
        fields[name] = candidate;
      }
    }
    return fields;
  }
}
