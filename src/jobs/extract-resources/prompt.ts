/**
 * Resources Extraction Prompt
 */

export const RESOURCES_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the RESOURCES that the professionals draw on: codes of ethics, technical standards, statutes and regulations, precedent cases, expert opinions, decision tools.

# EXISTING RESOURCE CLASSES
{{ existing_resources_text }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW RESOURCE CLASSES
Report kinds of resource not already covered above. For each class give:
- label, definition
- resource_category: one of professional_code, case_precedent, expert_interpretation, technical_standard, legal_resource, decision_tool, reference_material
- authority_source: who issues or maintains it
- extensional_function: how it makes abstract norms concrete
- usage_context: list of situations in which it is used
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - RESOURCE INDIVIDUALS
For each specific document or tool cited in the case:
- identifier: the name as cited, e.g. "Code of Ethics Section II.1"
- resource_class: the class it instantiates
- document_title, created_by, version
- used_by: who relies on it
- used_in_context: how it is used in this case
- text_references, confidence

# CASE TEXT
{{ case_text }}

# OUTPUT
Respond with JSON only:
{
  "new_resource_classes": [ ... ],
  "resource_individuals": [ ... ]
}`;
