import { describe, expect, it } from 'vitest';
import { getConceptConfig } from '../../jobs/registry.js';
import { TEST_NAMESPACES, TEST_TIMESTAMP, roleClass, roleIndividual } from '../../__tests__/fixtures.js';
import { convertToGraph, sanitizeLabel, toCamelCase } from '../ResultGraphConverter.js';

const roles = getConceptConfig('roles');
const options = { namespaces: TEST_NAMESPACES, timestamp: TEST_TIMESTAMP, passNumber: 1 };

describe('convertToGraph', () => {
  it('mints a class with its category parent, properties and provenance', () => {
    const candidate = roleClass('Site Engineer', {
      role_category: 'provider_client',
      source_text: 'The engineer stamped the drawings',
      text_references: ['quote one'],
      distinguishing_features: ['Stamps drawings'],
    });

    const { new_classes } = convertToGraph([candidate], [], roles, 42, 'facts', options);

    expect(new_classes).toEqual([
      {
        uri: 'http://test.example/intermediate#SiteEngineer',
        label: 'Site Engineer',
        definition: 'Site Engineer definition',
        parent: 'http://test.example/intermediate#ProviderClientRole',
        properties: {
          textReferences: ['quote one'],
          confidence: ['0.8'],
          distinguishingFeatures: ['Stamps drawings'],
          roleCategory: ['provider_client'],
          generatedAtTime: [TEST_TIMESTAMP],
          wasAttributedTo: ['Case 42 Extraction'],
          firstDiscoveredInCase: ['42'],
          firstDiscoveredAt: [TEST_TIMESTAMP],
          discoveredInCase: ['42'],
          discoveredInSection: ['facts'],
          discoveredInPass: ['1'],
          sourceText: ['The engineer stamped the drawings'],
        },
        source_text: 'The engineer stamped the drawings',
        section_sources: ['facts'],
        source_texts: { facts: 'The engineer stamped the drawings' },
        match_decision: {
          matches_existing: false,
          matched_uri: null,
          matched_label: null,
          confidence: 0,
          reasoning: null,
        },
        category: 'provider_client',
      },
    ]);
  });

  it('falls back to the core base class without a category', () => {
    const { new_classes } = convertToGraph([roleClass('Witness')], [], roles, 42, 'facts', options);

    expect(new_classes[0].parent).toBe('http://test.example/core#Role');
    expect(new_classes[0]).not.toHaveProperty('category');
    expect(new_classes[0].source_text).toBeNull();
    expect(new_classes[0].source_texts).toEqual({});
  });

  it('mints case individuals typed by their class', () => {
    const individual = roleIndividual('Jane Doe', 'Site Engineer', {
      case_involvement: 'Reviewed the plans',
      attributes: { license: 'PE' },
      text_references: ['Jane reviewed'],
    });

    const [converted] = convertToGraph([], [individual], roles, 42, 'discussion', options).new_individuals;

    expect(converted.uri).toBe('http://test.example/case/42#Jane_Doe');
    expect(converted.label).toBe('Jane Doe');
    expect(converted.types).toEqual(['http://test.example/intermediate#SiteEngineer']);
    expect(converted.definition).toBe('Reviewed the plans');
    expect(converted.properties.roleClass).toEqual(['Site Engineer']);
    expect(converted.properties.attributes).toEqual(['{"license":"PE"}']);
    expect(converted.properties.discoveredInSection).toEqual(['discussion']);
    expect(converted.properties).not.toHaveProperty('sourceText');
    expect(converted.source_text).toBe('Jane reviewed');
    expect(converted.source_texts).toEqual({ discussion: 'Jane reviewed' });
  });

  it('leaves untyped individuals without types and falls back to a description', () => {
    const individual = roleIndividual('Town Council', undefined, { description: 'Local authority' });

    const [converted] = convertToGraph([], [individual], roles, 7, 'facts', options).new_individuals;

    expect(converted.types).toEqual([]);
    expect(converted.definition).toBe('Local authority');
    expect(converted.uri).toBe('http://test.example/case/7#Town_Council');
  });
});

describe('label helpers', () => {
  it('sanitizes labels for URIs', () => {
    expect(sanitizeLabel('Engineer (PE), "Lead"')).toBe('EngineerPELead');
    expect(sanitizeLabel('Jane Doe', '_')).toBe('Jane_Doe');
  });

  it('camel-cases snake_case field names', () => {
    expect(toCamelCase('case_involvement')).toBe('caseInvolvement');
    expect(toCamelCase('confidence')).toBe('confidence');
  });
});
