/**
 * Principles Extraction Prompt
 *
 * {{ cross_concept_context }} carries the roles extracted in pass 1.
 */

export const PRINCIPLES_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the ethical PRINCIPLES at stake: abstract ideals such as public safety, honesty, fairness or professional competence, and how this case gives them concrete meaning.

# EXISTING PRINCIPLE CLASSES
{{ existing_principles_text }}
{{ cross_concept_context }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW PRINCIPLE CLASSES
Report principles not already covered above. For each class give:
- label, definition
- principle_category: fundamental_ethical, professional_virtue, relational or domain_specific
- abstract_nature: the ideal it expresses
- extensional_examples: concrete applications that give it meaning
- value_basis: the underlying value
- operationalization: how it becomes actionable
- derived_obligations: obligations that follow from it
- potential_conflicts: principles it may conflict with
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - PRINCIPLE INDIVIDUALS
For each place where the case invokes a principle:
- identifier: short unique name, e.g. "Public safety in bridge inspection"
- principle_class: the class it instantiates
- concrete_expression: the words or conduct expressing it
- invoked_by, applied_to: lists
- interpretation: how it is read in this case
- balancing_with: principles it is weighed against
- tension_resolution: how the tension is resolved
- text_references, confidence

# CASE TEXT
{{ case_text }}`;
