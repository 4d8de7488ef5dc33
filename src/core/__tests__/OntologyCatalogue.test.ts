import { describe, expect, it, vi } from 'vitest';
import { TransientError } from '../../utils/errors.js';
import { HttpOntologyCatalogue, InMemoryOntologyCatalogue, parseOntologyEntity } from '../OntologyCatalogue.js';
import { ENGINEER_ENTITY } from '../../__tests__/fixtures.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('parseOntologyEntity', () => {
  it('accepts alternative key names', () => {
    expect(
      parseOntologyEntity({ iri: 'http://test.example/x#A', name: 'A', description: 'An A', source: 'test-extended' })
    ).toEqual({
      uri: 'http://test.example/x#A',
      label: 'A',
      definition: 'An A',
      tier: 'extracted',
      source: 'test-extended',
    });
  });

  it('drops entries without a URI or a label', () => {
    expect(parseOntologyEntity({ label: 'No URI' })).toBeNull();
    expect(parseOntologyEntity({ uri: 'http://test.example/x#B' })).toBeNull();
    expect(parseOntologyEntity('Engineer')).toBeNull();
  });
});

describe('HttpOntologyCatalogue', () => {
  it('loads a bare entity array for a category', async () => {
    const fetchFn = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse([
        { uri: 'http://test.example/core#Engineer', label: 'Engineer', definition: 'Designs things', tier: 'canonical' },
        { label: 'Dropped' },
      ])
    );
    const catalogue = new HttpOntologyCatalogue('http://onto.test', 1000, fetchFn);

    const entities = await catalogue.getEntitiesByCategory('Role');

    expect(entities).toEqual([
      { uri: 'http://test.example/core#Engineer', label: 'Engineer', definition: 'Designs things', tier: 'canonical', source: undefined },
    ]);
    expect(fetchFn.mock.calls[0][0]).toBe('http://onto.test/api/ontology/entities/Role');
  });

  it('accepts an { entities } envelope', async () => {
    const fetchFn = vi.fn(async () => jsonResponse({ entities: [{ id: 'http://test.example/core#Client', label: 'Client' }] }));
    const catalogue = new HttpOntologyCatalogue('http://onto.test', 1000, fetchFn);

    const entities = await catalogue.getEntitiesByCategory('Role');

    expect(entities.map((entity) => entity.uri)).toEqual(['http://test.example/core#Client']);
  });

  it('fails on a non-OK status', async () => {
    const fetchFn = vi.fn(async () => jsonResponse({ error: 'down' }, 503));
    const catalogue = new HttpOntologyCatalogue('http://onto.test', 1000, fetchFn);

    await expect(catalogue.getEntitiesByCategory('Role')).rejects.toThrow(
      'Ontology catalogue returned HTTP 503 for Role'
    );
  });

  it('turns network failures into transient errors', async () => {
    const fetchFn = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const catalogue = new HttpOntologyCatalogue('http://onto.test', 1000, fetchFn);

    const error = await catalogue.getEntitiesByCategory('Role').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toHaveProperty('message', 'Ontology catalogue Role: connection failure (fetch failed)');
  });
});

describe('InMemoryOntologyCatalogue', () => {
  it('returns a copy of the entities of a category', async () => {
    const catalogue = new InMemoryOntologyCatalogue({ Role: [ENGINEER_ENTITY] });

    const entities = await catalogue.getEntitiesByCategory('Role');
    entities.pop();

    expect(await catalogue.getEntitiesByCategory('Role')).toEqual([ENGINEER_ENTITY]);
    expect(await catalogue.getEntitiesByCategory('State')).toEqual([]);
  });
});
