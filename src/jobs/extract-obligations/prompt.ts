/**
 * Obligations Extraction Prompt
 */

export const OBLIGATIONS_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the OBLIGATIONS the professionals are under: specific duties that say who must do what, and when.

# EXISTING OBLIGATION CLASSES
{{ existing_obligations_text }}
{{ cross_concept_context }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW OBLIGATION CLASSES
Report kinds of duty not already covered above. For each class give:
- label, definition
- obligation_type: disclosure, safety, competence, confidentiality, reporting, collegial, legal or ethical
- enforcement_level: mandatory, defeasible, conditional or prima_facie
- derived_from_principle: the principle it follows from
- violation_consequences, monitoring_criteria
- stakeholders_affected: list
- code_reference: the code provision, if the case cites one
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - OBLIGATION INDIVIDUALS
For each concrete duty in this case:
- identifier: short unique name, e.g. "Engineer A duty to report defect"
- obligation_class: the class it instantiates
- obligated_party: who bears it
- obligation_statement: the duty in one sentence
- case_context, temporal_scope
- compliance_status: met, unmet, partial or unclear
- text_references, confidence

# CASE TEXT
{{ case_text }}`;
