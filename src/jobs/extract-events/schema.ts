import type { SchemaObject } from 'ajv';
import {
  candidateSchema,
  individualSchema,
  optionalEnum,
  optionalInteger,
  optionalString,
  resultSchema,
  stringList,
  type BaseCandidate,
  type BaseIndividual,
} from '../schemaParts.js';

export const EVENT_CATEGORIES = [
  'crisis',
  'compliance',
  'conflict',
  'project',
  'safety',
  'evaluation',
  'discovery',
  'change',
] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

export const CAUSAL_POSITIONS = ['trigger', 'intermediate', 'outcome'] as const;

export type CausalPosition = (typeof CAUSAL_POSITIONS)[number];

export interface CandidateEventClass extends BaseCandidate {
  event_category?: EventCategory | null;
  automatic_nature?: string | null;
  ethical_salience?: string | null;
  causal_position?: CausalPosition | null;
  constraint_activation: string[];
  obligation_transformation?: string | null;
  state_transitions: string[];
}

export interface EventIndividual extends BaseIndividual {
  event_class?: string;
  occurred_to?: string | null;
  discovered_by?: string | null;
  temporal_interval?: string | null;
  sequence_order?: number | null;
  causal_triggers?: string[];
  causal_results?: string[];
  constraints_activated?: string[];
  obligations_triggered?: string[];
  states_changed?: string[];
  case_context?: string | null;
}

export const candidateEventClassSchema: SchemaObject = candidateSchema({
  event_category: optionalEnum(EVENT_CATEGORIES, 'Kind of event'),
  automatic_nature: optionalString('Why the event happens without anyone choosing it'),
  ethical_salience: optionalString('Why the event matters ethically'),
  causal_position: optionalEnum(CAUSAL_POSITIONS, 'Place in the causal chain'),
  constraint_activation: stringList('Constraints the event activates'),
  obligation_transformation: optionalString('How the event changes obligations'),
  state_transitions: stringList('States the event starts or ends'),
});

export const eventIndividualSchema: SchemaObject = individualSchema({
  event_class: { type: 'string', default: '', description: 'Event class label or URI' },
  occurred_to: optionalString('Who or what the event happened to'),
  discovered_by: optionalString('Who noticed it'),
  temporal_interval: optionalString('When it happened'),
  sequence_order: optionalInteger('Position in the case timeline'),
  causal_triggers: stringList('What led to it'),
  causal_results: stringList('What it led to'),
  constraints_activated: stringList('Constraints it activated'),
  obligations_triggered: stringList('Obligations it triggered'),
  states_changed: stringList('States it changed'),
  case_context: optionalString('Circumstances in the case'),
});

export const eventResultSchema: SchemaObject = resultSchema(
  candidateEventClassSchema,
  eventIndividualSchema
);
