#!/usr/bin/env node

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import pLimit from 'p-limit';
import { DatabaseConfig } from './config/database.js';
import { ExtractionConfig } from './config/extraction.js';
import { ConceptExtractor, type ExtractorDependencies } from './core/ConceptExtractor.js';
import { HttpOntologyCatalogue } from './core/OntologyCatalogue.js';
import {
  InMemoryPromptTemplateStore,
  PostgresPromptTemplateStore,
  type PromptTemplateStore,
} from './core/PromptTemplateStore.js';
import { ProviderFactory } from './core/providers/index.js';
import { JsonFileResultsSink } from './core/ResultsSink.js';
import { convertToGraph } from './graph/ResultGraphConverter.js';
import type { ConceptConfig } from './jobs/ConceptConfig.js';
import { getConceptConfig, resolveConceptType } from './jobs/registry.js';
import { loadManifest, readSections } from './pipeline/manifest.js';
import {
  PipelineOrchestrator,
  type PipelineEvent,
  type PipelineResult,
  type PipelineRunOptions,
} from './pipeline/PipelineOrchestrator.js';
import { JsonFileProvenanceStore } from './provenance/ProvenanceStore.js';
import { isConsolidationStrategy, VersionStatus, type ConsolidationStrategy } from './provenance/types.js';
import { VersionedProvenanceTracker } from './provenance/VersionedProvenanceTracker.js';
import { ValidationError } from './utils/errors.js';
import { htmlToText } from './utils/html.js';
import { logger } from './utils/logger.js';

/**
 * CLI for concept extraction and provenance management
 *
 * Usage:
 *   npm run dev extract <concept> --case <id> --file <path>   - One concept over one section
 *   npm run dev pipeline --case <id> --facts <path> ...       - All passes for one case
 *   npm run dev batch <manifest.json>                         - Several cases concurrently
 *   npm run dev versions <workflow>                           - Version history
 *   npm run dev promote <versionId>                           - Promote a version to production
 *   npm run dev consolidate <workflow> <id,id,id>             - Merge versions
 *   npm run dev cleanup                                       - Delete expired development versions
 *   npm run dev test-connections                              - Test database and catalogue
 */

const COMMANDS = [
  'extract',
  'pipeline',
  'batch',
  'versions',
  'promote',
  'consolidate',
  'cleanup',
  'test-connections',
  'help',
];

const WORKFLOW_NAME = 'concept_extraction';

interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

/**
 * Split "--name value" and bare "--switch" flags from positional arguments
 */
function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags.set(name, next);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}

function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function requireFlag(parsed: ParsedArgs, name: string, usage: string): string {
  const value = stringFlag(parsed, name);
  if (!value) {
    throw new ValidationError(`--${name} is required\nUsage: ${usage}`);
  }
  return value;
}

function parseCaseId(value: string): number {
  const caseId = Number.parseInt(value, 10);
  if (!Number.isInteger(caseId) || caseId < 1) {
    throw new ValidationError(`Invalid case id: ${value}`);
  }
  return caseId;
}

function parsePasses(value: string | undefined): number[] | undefined {
  if (!value) {
    return undefined;
  }
  return value.split(',').map((part) => {
    const pass = Number.parseInt(part.trim(), 10);
    if (Number.isNaN(pass)) {
      throw new ValidationError(`Invalid pass number: ${part}`);
    }
    return pass;
  });
}

/**
 * Fresh provider, catalogue and template store for one command run.
 * Returns a close() for the database pool when templates come from Postgres.
 */
function createDependencies(parsed: ParsedArgs): { deps: ExtractorDependencies; close: () => Promise<void> } {
  let templates: PromptTemplateStore = InMemoryPromptTemplateStore.fromShippedTemplates();
  let close = async () => {};

  if (parsed.flags.has('db-templates')) {
    const pool = DatabaseConfig.createPool();
    templates = new PostgresPromptTemplateStore(pool);
    close = async () => {
      await pool.end();
    };
  }

  return {
    deps: {
      provider: ProviderFactory.createProvider(),
      catalogue: new HttpOntologyCatalogue(),
      templates,
    },
    close,
  };
}

function retryOptions() {
  return { maxAttempts: ExtractionConfig.getConfig().retryAttempts };
}

function printEvent(event: PipelineEvent): void {
  switch (event.type) {
    case 'pass_started':
      console.log(`\n▶️  Pass ${event.passNumber} (${event.name}) on ${event.sectionType}: ${event.concepts.join(', ')}`);
      break;
    case 'concept_started':
      console.log(`   ⏳ ${event.concept}...`);
      break;
    case 'concept_completed': {
      const { result } = event;
      console.log(
        `   ✅ ${result.concept}: ${result.classCount} classes, ${result.individualCount} individuals (${result.elapsedSeconds}s)`
      );
      if (result.storageError) {
        console.log(`   ⚠️  ${result.storageError}`);
      }
      break;
    }
    case 'concept_failed':
      console.log(`   ❌ ${event.result.error}`);
      break;
    case 'pass_completed':
      console.log(`   🏁 Pass ${event.passNumber} done`);
      break;
    case 'pipeline_completed':
      break;
  }
}

function printSummary(result: PipelineResult): void {
  const statusEmoji = result.status === 'completed' ? '✅' : '❌';
  console.log(`\n${statusEmoji} Case ${result.caseId}: ${result.status}`);
  console.log(`   Classes: ${result.totals.classes}`);
  console.log(`   Individuals: ${result.totals.individuals}`);
  console.log(`   Concepts: ${result.totals.succeeded} succeeded, ${result.totals.failed} failed`);
  console.log(`   Time: ${result.totals.elapsedSeconds}s`);
  for (const error of result.errors) {
    console.log(`   - ${error}`);
  }
}

/**
 * Run one case through the pipeline inside a versioned provenance workflow
 */
async function runCase(
  tracker: VersionedProvenanceTracker,
  deps: ExtractorDependencies,
  options: PipelineRunOptions,
  verbose: boolean
): Promise<PipelineResult> {
  return tracker.trackVersionedWorkflow(
    WORKFLOW_NAME,
    async (versioning) => {
      const orchestrator = new PipelineOrchestrator({
        ...deps,
        sink: new JsonFileResultsSink(),
        tracker,
        versioning,
        retry: retryOptions(),
      });

      const stream = orchestrator.runStream(options);
      let step = await stream.next();
      while (!step.done) {
        if (verbose) {
          printEvent(step.value);
        }
        step = await stream.next();
      }
      return step.value;
    },
    { description: `Case ${options.caseId}` }
  );
}

/**
 * Extract one concept from one section file
 */
async function extractConcept(parsed: ParsedArgs): Promise<void> {
  const usage = 'npm run dev extract <concept> --case <id> --file <path> [--section facts]';
  const conceptArg = parsed.positional[1];
  if (!conceptArg) {
    throw new ValidationError(`Concept type is required\nUsage: ${usage}`);
  }

  const concept = resolveConceptType(conceptArg);
  const config: ConceptConfig = getConceptConfig(concept);
  const caseId = parseCaseId(requireFlag(parsed, 'case', usage));
  const sectionType = stringFlag(parsed, 'section') ?? 'facts';
  const text = htmlToText(await fs.readFile(requireFlag(parsed, 'file', usage), 'utf-8'));

  console.log(`\n🔍 Extracting ${concept} from case ${caseId} (${sectionType})...\n`);

  const { deps, close } = createDependencies(parsed);
  try {
    const extractor = await ConceptExtractor.create(config, deps);
    const result = await extractor.extract(text, caseId, sectionType);
    const data = convertToGraph(result.classes, result.individuals, config, caseId, sectionType, {
      passNumber: config.step,
    });

    const sink = new JsonFileResultsSink();
    const sessionId = randomUUID();
    await sink.storeResults({
      caseId,
      concept,
      passNumber: config.step,
      sectionType,
      sessionId,
      data,
      ontologyDefinitions: result.ontologyDefinitions,
      storedAt: new Date().toISOString(),
    });

    console.log(`✅ ${result.classes.length} classes, ${result.individuals.length} individuals`);
    if (result.discarded > 0) {
      console.log(`⚠️  ${result.discarded} invalid items discarded`);
    }
    for (const candidate of result.classes) {
      const matched = candidate.match_decision.matches_existing ? ` → ${candidate.match_decision.matched_label}` : '';
      console.log(`   • ${candidate.label}${matched}`);
    }
    console.log(`\n📁 Results: ${sink.resultPath(caseId, concept, sessionId)}`);
  } finally {
    await close();
  }
}

/**
 * Run the passes for one case
 */
async function runPipeline(parsed: ParsedArgs): Promise<void> {
  const usage = 'npm run dev pipeline --case <id> --facts <path> --discussion <path> [--passes 1,2,3]';
  const caseId = parseCaseId(requireFlag(parsed, 'case', usage));

  const sectionFiles: Record<string, string> = {};
  for (const section of ['facts', 'discussion', 'questions', 'conclusions']) {
    const file = stringFlag(parsed, section);
    if (file) {
      sectionFiles[section] = file;
    }
  }
  if (Object.keys(sectionFiles).length === 0) {
    throw new ValidationError(`At least one section file is required\nUsage: ${usage}`);
  }

  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const { deps, close } = createDependencies(parsed);
  try {
    const result = await runCase(
      tracker,
      deps,
      { caseId, sections: await readSections(sectionFiles), passes: parsePasses(stringFlag(parsed, 'passes')) },
      true
    );
    printSummary(result);
  } finally {
    await close();
  }
}

/**
 * Run every case of a manifest, several at a time
 */
async function runBatch(parsed: ParsedArgs): Promise<void> {
  const usage = 'npm run dev batch <manifest.json> [--concurrency 2]';
  const manifestPath = parsed.positional[1];
  if (!manifestPath) {
    throw new ValidationError(`Manifest path is required\nUsage: ${usage}`);
  }

  const concurrency = Number.parseInt(stringFlag(parsed, 'concurrency') ?? '2', 10);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`Invalid concurrency: ${stringFlag(parsed, 'concurrency')}`);
  }

  const manifest = await loadManifest(manifestPath);
  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const limit = pLimit(concurrency);

  console.log(`\n🚀 Running ${manifest.cases.length} cases (concurrency ${concurrency})\n`);

  // Each case gets its own provider, catalogue and template store
  const outcomes = await Promise.allSettled(
    manifest.cases.map((entry) =>
      limit(async () => {
        const { deps, close } = createDependencies(parsed);
        try {
          const sections = await readSections(entry.sections);
          const result = await runCase(tracker, deps, { caseId: entry.caseId, sections, passes: entry.passes }, false);
          printSummary(result);
          return result;
        } finally {
          await close();
        }
      })
    )
  );

  const failed = outcomes.filter((outcome) => outcome.status === 'rejected' || outcome.value.status === 'failed');
  outcomes.forEach((outcome, index) => {
    if (outcome.status === 'rejected') {
      logger.error(`Case ${manifest.cases[index].caseId} failed`, outcome.reason);
    }
  });

  console.log(`\n✨ Batch done: ${outcomes.length - failed.length}/${outcomes.length} cases completed`);
  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

const STATUS_EMOJI: Record<VersionStatus, string> = {
  [VersionStatus.DRAFT]: '📝',
  [VersionStatus.CANDIDATE]: '🔍',
  [VersionStatus.RELEASED]: '✅',
  [VersionStatus.SUPERSEDED]: '⏭️',
  [VersionStatus.ARCHIVED]: '📦',
};

async function listVersions(parsed: ParsedArgs): Promise<void> {
  const workflow = parsed.positional[1] ?? WORKFLOW_NAME;
  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const versions = await tracker.getVersionHistory(workflow);

  if (versions.length === 0) {
    console.log(`\nNo versions found for ${workflow}.`);
    return;
  }

  console.log(`\n📋 Versions of ${workflow}:\n`);
  for (const version of versions) {
    const statusEmoji = STATUS_EMOJI[version.status];

    console.log(`${statusEmoji} ${version.version_number} (${version.environment}, ${version.status})`);
    console.log(`   ID: ${version.id}`);
    console.log(`   Created: ${new Date(version.created_at).toLocaleString()}`);
    if (version.is_consolidated) {
      console.log(`   Consolidated from: ${version.consolidated_from.join(', ')}`);
    }
    const metrics = Object.entries(version.performance_metrics);
    if (metrics.length > 0) {
      console.log(`   Metrics: ${metrics.map(([key, value]) => `${key}=${value}`).join(', ')}`);
    }
    console.log('');
  }
}

async function promoteVersion(parsed: ParsedArgs): Promise<void> {
  const versionId = parsed.positional[1];
  if (!versionId) {
    throw new ValidationError('Version id is required\nUsage: npm run dev promote <versionId> [--approved-by name]');
  }

  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const version = await tracker.markAsProduction(versionId, stringFlag(parsed, 'approved-by'));
  console.log(`\n✅ Version ${version.version_number} promoted to production`);
}

async function consolidate(parsed: ParsedArgs): Promise<void> {
  const usage = 'npm run dev consolidate <workflow> <id,id,id> [--strategy latest_best]';
  const workflow = parsed.positional[1];
  const ids = parsed.positional[2];
  if (!workflow || !ids) {
    throw new ValidationError(`Workflow and version ids are required\nUsage: ${usage}`);
  }

  const strategyArg = stringFlag(parsed, 'strategy');
  let strategy: ConsolidationStrategy | undefined;
  if (strategyArg !== undefined) {
    if (!isConsolidationStrategy(strategyArg)) {
      throw new ValidationError(`Unknown consolidation strategy: ${strategyArg}`);
    }
    strategy = strategyArg;
  }

  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const version = await tracker.consolidateVersions(
    workflow,
    ids.split(',').map((id) => id.trim()).filter(Boolean),
    strategy
  );
  console.log(`\n✅ Consolidated into version ${version.version_number} (${version.id})`);
}

async function cleanup(parsed: ParsedArgs): Promise<void> {
  const tracker = new VersionedProvenanceTracker(await JsonFileProvenanceStore.open());
  const count = await tracker.cleanupDevelopmentVersions(parsed.flags.has('force'));
  console.log(`\n🧹 Removed ${count} provenance records`);
}

/**
 * Test database and catalogue connections
 */
async function testConnections(): Promise<void> {
  console.log('\n🧪 Testing connections...\n');

  let allOk = true;

  console.log('Testing PostgreSQL connection...');
  const database = await DatabaseConfig.checkConnection();
  if (database.status === 'not_configured') {
    console.log(`⚠️  Database not configured (${database.message}); shipped templates will be used\n`);
  } else if (database.status === 'unavailable') {
    console.log('⚠️  Database unavailable; shipped templates will be used\n');
  }

  console.log('Testing ontology catalogue...');
  try {
    const entities = await new HttpOntologyCatalogue().getEntitiesByCategory('Role');
    console.log(`✅ Catalogue returned ${entities.length} Role entities\n`);
  } catch (error) {
    console.log(`❌ Catalogue unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
    allOk = false;
  }

  console.log('Testing LLM provider configuration...');
  try {
    const provider = ProviderFactory.createProvider();
    console.log(`✅ Provider ready (models: ${provider.modelFor('default')}, ${provider.modelFor('powerful')})\n`);
  } catch (error) {
    console.log(`❌ Provider misconfigured: ${error instanceof Error ? error.message : String(error)}\n`);
    allOk = false;
  }

  if (allOk) {
    console.log('✅ All required connections successful!');
  } else {
    console.log('❌ Some required connections failed. Please check your .env file.');
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`
Concept Extraction Engine

USAGE:
  npm run dev <command> [options]

COMMANDS:
  extract <concept> --case <id> --file <path> [--section facts]
                                   Extract one concept type from one section
  pipeline --case <id> --facts <path> --discussion <path> [--passes 1,2,3]
                                   Run the three-pass pipeline for one case
  batch <manifest.json> [--concurrency 2]
                                   Run the pipeline for every case in a manifest
  versions [workflow]              List provenance versions, newest first
  promote <versionId> [--approved-by name]
                                   Promote a version to production
  consolidate <workflow> <id,id,id> [--strategy latest_best|average|union]
                                   Merge several versions into one
  cleanup [--force]                Delete expired development versions
  test-connections                 Test database, catalogue and provider setup
  help                             Show this help message

OPTIONS:
  --db-templates                   Read prompt templates from PostgreSQL
                                   instead of the shipped ones

CONCEPTS:
  roles, states, resources, principles, obligations,
  constraints, capabilities, actions, events

ENVIRONMENT:
  Configuration is loaded from .env (see .env.example)
`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  const command = parsed.positional[0];

  if (!command || command === 'help') {
    printHelp();
    return;
  }

  try {
    switch (command) {
      case 'extract':
        await extractConcept(parsed);
        break;
      case 'pipeline':
        await runPipeline(parsed);
        break;
      case 'batch':
        await runBatch(parsed);
        break;
      case 'versions':
        await listVersions(parsed);
        break;
      case 'promote':
        await promoteVersion(parsed);
        break;
      case 'consolidate':
        await consolidate(parsed);
        break;
      case 'cleanup':
        await cleanup(parsed);
        break;
      case 'test-connections':
        await testConnections();
        break;
      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

await main();
