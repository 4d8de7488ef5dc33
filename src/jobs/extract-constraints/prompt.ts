/**
 * Constraints Extraction Prompt
 */

export const CONSTRAINTS_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the CONSTRAINTS that bound what the professionals can do: legal and regulatory limits, budgets and deadlines, jurisdiction, the limits of their competence.

# EXISTING CONSTRAINT CLASSES
{{ existing_constraints_text }}
{{ cross_concept_context }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW CONSTRAINT CLASSES
- label, definition
- constraint_type: legal, regulatory, resource, competence, jurisdictional, procedural, safety, confidentiality, ethical, temporal or priority
- flexibility: hard, soft or negotiable
- violation_impact
- mitigation_strategies, affected_stakeholders: lists
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - CONSTRAINT INDIVIDUALS
- identifier: short unique name, e.g. "Project budget cap"
- constraint_class: the class it instantiates
- constrained_entity: who or what is limited
- constraint_statement: the limit in one sentence
- source: where the limit comes from
- temporal_scope, case_context
- severity: critical, major or minor
- text_references, confidence

# CASE TEXT
{{ case_text }}`;
