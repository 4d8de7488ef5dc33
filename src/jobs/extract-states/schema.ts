import type { SchemaObject } from 'ajv';
import {
  candidateSchema,
  individualSchema,
  optionalEnum,
  optionalString,
  resultSchema,
  stringList,
  type BaseCandidate,
  type BaseIndividual,
} from '../schemaParts.js';

export const STATE_CATEGORIES = [
  'conflict',
  'risk',
  'competence',
  'relationship',
  'information',
  'emergency',
  'regulatory',
  'temporal',
  'resource',
] as const;

export type StateCategory = (typeof STATE_CATEGORIES)[number];

/**
 * Inertial states persist until terminated; non-inertial ones last only
 * while their triggering condition holds.
 */
export const PERSISTENCE_TYPES = ['inertial', 'non_inertial'] as const;

export type PersistenceType = (typeof PERSISTENCE_TYPES)[number];

export const URGENCY_LEVELS = ['low', 'medium', 'high', 'critical'] as const;

export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

export interface CandidateStateClass extends BaseCandidate {
  state_category?: StateCategory | null;
  persistence_type?: PersistenceType | null;
  activation_conditions: string[];
  termination_conditions: string[];
  obligation_activation: string[];
  action_constraints: string[];
  principle_transformation?: string | null;
}

export interface StateIndividual extends BaseIndividual {
  state_class?: string;
  subject?: string | null;
  active_period?: string | null;
  triggering_event?: string | null;
  terminated_by?: string | null;
  affected_parties?: string[];
  urgency_level?: UrgencyLevel | null;
}

export const candidateStateClassSchema: SchemaObject = candidateSchema({
  state_category: optionalEnum(STATE_CATEGORIES, 'Kind of situational state'),
  persistence_type: optionalEnum(PERSISTENCE_TYPES, 'Whether the state persists once triggered'),
  activation_conditions: stringList('Events or conditions that bring the state about'),
  termination_conditions: stringList('Events or conditions that end the state'),
  obligation_activation: stringList('Obligations the state activates'),
  action_constraints: stringList('Actions the state limits'),
  principle_transformation: optionalString('How the state changes the weight of principles'),
});

export const stateIndividualSchema: SchemaObject = individualSchema({
  state_class: { type: 'string', default: '', description: 'State class label or URI' },
  subject: optionalString('Who or what is in the state'),
  active_period: optionalString('When the state holds'),
  triggering_event: optionalString('What brought the state about'),
  terminated_by: optionalString('What ended the state'),
  affected_parties: stringList('Parties affected by the state'),
  urgency_level: optionalEnum(URGENCY_LEVELS, 'How pressing the state is'),
});

export const stateResultSchema: SchemaObject = resultSchema(
  candidateStateClassSchema,
  stateIndividualSchema
);
