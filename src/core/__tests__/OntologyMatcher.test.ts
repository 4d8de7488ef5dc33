import { describe, expect, it } from 'vitest';
import { CLIENT_ENTITY, ENGINEER_ENTITY, roleClass, roleIndividual } from '../../__tests__/fixtures.js';
import { getConceptConfig } from '../../jobs/registry.js';
import { defaultMatchDecision } from '../../jobs/schemaParts.js';
import { linkIndividuals } from '../IndividualLinker.js';
import {
  collectOntologyDefinitions,
  LABEL_MATCH_CONFIDENCE,
  LABEL_MATCH_REASONING,
  matchClasses,
  normalizeLabel,
} from '../OntologyMatcher.js';

const entities = [ENGINEER_ENTITY, CLIENT_ENTITY];

/* ===== Class matching ===== */

describe('matchClasses', () => {
  it('matches on the normalized label only', () => {
    const engineer = roleClass('engineer');
    const designEngineer = roleClass('Design Engineer');

    const matched = matchClasses([engineer, designEngineer], entities);

    expect(matched).toBe(1);
    expect(engineer.match_decision).toEqual({
      matches_existing: true,
      matched_uri: ENGINEER_ENTITY.uri,
      matched_label: 'Engineer',
      confidence: LABEL_MATCH_CONFIDENCE,
      reasoning: LABEL_MATCH_REASONING,
    });
    expect(designEngineer.match_decision).toEqual(defaultMatchDecision());
  });

  it('resolves an LLM-claimed match by its label', () => {
    const cls = roleClass('Customer', {
      match_decision: { matches_existing: true, matched_uri: null, matched_label: 'client', confidence: 0.8, reasoning: 'Same role' },
    });

    matchClasses([cls], entities);

    expect(cls.match_decision).toEqual({
      matches_existing: true,
      matched_uri: CLIENT_ENTITY.uri,
      matched_label: 'Client',
      confidence: 0.8,
      reasoning: 'Same role',
    });
  });

  it('resets a claimed match that points at nothing in the catalogue', () => {
    const cls = roleClass('Auditor', {
      match_decision: { matches_existing: true, matched_label: 'Auditor', confidence: 0.7, reasoning: 'guess' },
    });

    const matched = matchClasses([cls], entities);

    expect(matched).toBe(0);
    expect(cls.match_decision).toEqual(defaultMatchDecision());
  });

  it('keeps a claimed match that already carries an http IRI', () => {
    const cls = roleClass('Regulator', {
      match_decision: {
        matches_existing: true,
        matched_uri: 'http://other.example/Regulator',
        matched_label: 'Regulator',
        confidence: 0.85,
        reasoning: 'External class',
      },
    });

    expect(matchClasses([cls], entities)).toBe(1);
    expect(cls.match_decision.matched_uri).toBe('http://other.example/Regulator');
  });

  it('resets every class when the catalogue is empty', () => {
    const cls = roleClass('Engineer', {
      match_decision: { matches_existing: true, matched_label: 'Engineer', confidence: 0.9 },
    });

    expect(matchClasses([cls], [])).toBe(0);
    expect(cls.match_decision.matches_existing).toBe(false);
  });
});

describe('normalizeLabel', () => {
  it('lowercases, reads separators as spaces and collapses whitespace', () => {
    expect(normalizeLabel('  Public_Safety-Engineer   Role ')).toBe('public safety engineer role');
  });
});

describe('collectOntologyDefinitions', () => {
  it('returns catalogue definitions of matched classes that have one', () => {
    const engineer = roleClass('Engineer');
    const client = roleClass('Client');
    matchClasses([engineer, client], entities);

    expect(collectOntologyDefinitions([engineer, client], entities)).toEqual({
      Engineer: {
        text: 'A licensed professional engineer',
        sourceUri: ENGINEER_ENTITY.uri,
        sourceOntology: 'test-core',
      },
    });
  });
});

/* ===== Individual linking ===== */

describe('linkIndividuals', () => {
  it('links through matched classes and direct catalogue types', () => {
    const rolesConfig = getConceptConfig('roles');
    const engineer = roleClass('Engineer');
    const inspector = roleClass('Inspector');
    matchClasses([engineer, inspector], entities);

    const viaClass = roleIndividual('Engineer A', 'Engineer');
    const unmatchedClass = roleIndividual('Inspector C', 'Inspector');
    const direct = roleIndividual('Client B', 'client');
    const untyped = roleIndividual('Bystander');

    const linked = linkIndividuals([viaClass, unmatchedClass, direct, untyped], [engineer, inspector], entities, rolesConfig);

    expect(linked).toBe(2);
    expect(viaClass.match_decision).toEqual({
      matches_existing: true,
      matched_uri: ENGINEER_ENTITY.uri,
      matched_label: 'Engineer',
      confidence: LABEL_MATCH_CONFIDENCE,
      reasoning: `Via class 'Engineer': ${LABEL_MATCH_REASONING}`,
    });
    expect(unmatchedClass.match_decision).toEqual(defaultMatchDecision());
    expect(direct.match_decision).toEqual({
      matches_existing: true,
      matched_uri: CLIENT_ENTITY.uri,
      matched_label: 'Client',
      confidence: 0.95,
      reasoning: "Individual typed as existing ontology class 'Client'",
    });
    expect(untyped.match_decision).toEqual(defaultMatchDecision());
  });
});
