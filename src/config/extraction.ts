import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

export type ProviderType = 'anthropic' | 'openai' | 'mock';

const PROVIDERS: readonly ProviderType[] = ['anthropic', 'openai', 'mock'];

function isProviderType(value: string): value is ProviderType {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Extraction Configuration
 *
 * Which LLM backend to use and where run artefacts go.
 */
export class ExtractionConfig {
  static getConfig() {
    const provider = (process.env.LLM_PROVIDER || 'anthropic').toLowerCase();
    if (!isProviderType(provider)) {
      throw new ConfigurationError(
        `Unknown LLM_PROVIDER '${provider}'. Valid options: ${PROVIDERS.join(', ')}`
      );
    }

    return {
      provider,
      resultsDir: process.env.RESULTS_DIR || 'results',
      retryAttempts: parseInt(process.env.EXTRACTION_RETRY_ATTEMPTS || '3', 10),
    };
  }
}
