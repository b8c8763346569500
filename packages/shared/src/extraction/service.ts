/**
 * Extraction service boundary.
 *
 * The service is a black box: it receives a bounded prompt and returns a
 * payload that the call adapter validates. Implementations may throw
 * CallTimeoutError, CallServiceError or MalformedResponseError; anything else
 * is classified by the adapter.
 */

import type { PassName } from '../types';

export interface ExtractionRequest {
  segmentId: string;
  passName: PassName;
  systemPrompt: string;
  userPrompt: string;
  /** Characters of segment text included in the prompt. */
  textChars: number;
}

export interface ExtractionService {
  extract(request: ExtractionRequest, signal: AbortSignal): Promise<unknown>;
}
