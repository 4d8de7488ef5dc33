import dotenv from 'dotenv';

dotenv.config();

/**
 * Namespace bases used when minting class and individual URIs
 */
export interface OntologyNamespaces {
  core: string;
  intermediate: string;
  case: string;
}

/**
 * Ontology Configuration
 *
 * Location of the read-only entity catalogue and the namespaces new classes
 * and case individuals are minted under.
 */
export class OntologyConfig {
  static getConfig() {
    return {
      serviceUrl: (process.env.ONTOLOGY_SERVICE_URL || 'http://localhost:8082').replace(/\/+$/, ''),
      timeoutMs: parseInt(process.env.ONTOLOGY_TIMEOUT_MS || '10000', 10),
      namespaces: this.getNamespaces(),
    };
  }

  static getNamespaces(): OntologyNamespaces {
    return {
      core: process.env.ONTOLOGY_CORE_NS || 'http://ethics-ontology.org/core#',
      intermediate: process.env.ONTOLOGY_INTERMEDIATE_NS || 'http://ethics-ontology.org/intermediate#',
      case: process.env.ONTOLOGY_CASE_NS || 'http://ethics-ontology.org/case/',
    };
  }
}
