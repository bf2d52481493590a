import { NoopCorrector, type ArgumentCorrector } from './corrector.js';
import { LLMArgumentCorrector } from './llm-corrector.js';
import { createLLMClient, detectProvider } from '../llm/factory.js';
import type { ToolscopeConfig } from '../config/validator.js';
import { getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

export type { ArgumentCorrector, CorrectionRequest } from './corrector.js';
export { NoopCorrector } from './corrector.js';
export { LLMArgumentCorrector, describeToolError } from './llm-corrector.js';

/**
 * Corrector for a run. Falls back to the no-op corrector when correction
 * is disabled or no provider credentials are available.
 */
export function createCorrector(
  config: ToolscopeConfig['correction'],
  env: NodeJS.ProcessEnv = process.env
): ArgumentCorrector {
  const logger = getLogger('correction');
  if (!config.enabled) {
    return new NoopCorrector();
  }

  const provider = config.provider === 'auto' ? detectProvider(env) : config.provider;
  if (!provider) {
    logger.info('No LLM API key found, argument correction is off');
    return new NoopCorrector();
  }

  try {
    const llm = createLLMClient(
      { provider, model: config.model, apiKeyEnvVar: config.apiKeyEnvVar },
      env
    );
    logger.debug({ provider }, 'Argument correction enabled');
    return new LLMArgumentCorrector(llm);
  } catch (error) {
    logger.warn({ provider, error: getErrorMessage(error) }, 'Argument correction unavailable');
    return new NoopCorrector();
  }
}
