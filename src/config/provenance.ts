import dotenv from 'dotenv';

dotenv.config();

/**
 * Deployment environment a provenance version belongs to
 */
export enum VersionEnvironment {
  DEVELOPMENT = 'development',
  TEST = 'test',
  STAGING = 'staging',
  PRODUCTION = 'production',
}

const ENVIRONMENT_ALIASES: Record<string, VersionEnvironment> = {
  development: VersionEnvironment.DEVELOPMENT,
  dev: VersionEnvironment.DEVELOPMENT,
  test: VersionEnvironment.TEST,
  staging: VersionEnvironment.STAGING,
  production: VersionEnvironment.PRODUCTION,
  prod: VersionEnvironment.PRODUCTION,
};

/**
 * Provenance Configuration
 */
export class ProvenanceConfig {
  static getConfig() {
    return {
      environment: this.detectEnvironment(),
      storePath: process.env.PROVENANCE_STORE_PATH || 'provenance/store.json',
    };
  }

  /**
   * Environment from PROVENANCE_ENVIRONMENT; unknown values fall back to development
   */
  static detectEnvironment(value: string | undefined = process.env.PROVENANCE_ENVIRONMENT): VersionEnvironment {
    const key = (value || 'development').toLowerCase();
    return ENVIRONMENT_ALIASES[key] ?? VersionEnvironment.DEVELOPMENT;
  }
}
