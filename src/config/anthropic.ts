import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import type { ModelTier } from '../jobs/ConceptConfig.js';

dotenv.config();

/**
 * Anthropic Configuration
 *
 * Reads credentials and the model used for each tier. Concept extractions on
 * the "powerful" tier (contextual and normative passes) use the stronger
 * model; the temporal pass runs on the default one.
 */
export class AnthropicConfig {
  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const defaultModel = process.env.ANTHROPIC_MODEL_DEFAULT || 'claude-sonnet-4-5-20250929';
    const powerfulModel = process.env.ANTHROPIC_MODEL_POWERFUL || defaultModel;
    const timeoutMs = parseInt(process.env.LLM_TIMEOUT_MS || '180000', 10);

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      defaultModel,
      powerfulModel,
      timeoutMs,
    };
  }

  /**
   * Create a new Anthropic client. Retries are left to the extraction
   * retry wrapper, so the SDK's own retries are off.
   */
  static createClient(): Anthropic {
    const config = this.getConfig();
    return new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  /**
   * Model name for a tier
   */
  static getModel(tier: ModelTier): string {
    const config = this.getConfig();
    return tier === 'powerful' ? config.powerfulModel : config.defaultModel;
  }
}
