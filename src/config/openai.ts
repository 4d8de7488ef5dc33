import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';
import type { ModelTier } from '../jobs/ConceptConfig.js';

dotenv.config();

/**
 * OpenAI Configuration
 *
 * Alternative LLM backend for concept extraction (LLM_PROVIDER=openai).
 */
export class OpenAIConfig {
  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const defaultModel = process.env.OPENAI_MODEL_DEFAULT || 'gpt-4o-mini';
    const powerfulModel = process.env.OPENAI_MODEL_POWERFUL || 'gpt-4o';
    const timeoutMs = parseInt(process.env.LLM_TIMEOUT_MS || '180000', 10);

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
      defaultModel,
      powerfulModel,
      timeoutMs,
    };
  }

  /**
   * Create a new OpenAI client
   */
  static createClient(): OpenAI {
    const config = this.getConfig();
    return new OpenAI({
      apiKey: config.apiKey,
      organization: config.organization,
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
