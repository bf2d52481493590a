import type { Operation } from '../transport/types.js';
import type { ToolInvocationError } from '../errors/types.js';

export interface CorrectionRequest {
  operation: Operation;
  /** Arguments the tool rejected */
  args: Record<string, unknown>;
  error: ToolInvocationError;
}

/**
 * Repairs arguments after a validation failure. Returns replacement
 * arguments, or null when it has nothing better to offer.
 */
export interface ArgumentCorrector {
  correct(request: CorrectionRequest): Promise<Record<string, unknown> | null>;
}

/**
 * Used when correction is disabled or no provider is configured.
 */
export class NoopCorrector implements ArgumentCorrector {
  async correct(): Promise<Record<string, unknown> | null> {
    return null;
  }
}
