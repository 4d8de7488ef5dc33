/**
 * Actions Extraction Prompt
 */

export const ACTIONS_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the ACTIONS: deliberate choices made by the people in the case, such as disclosing, reporting, refusing, reviewing or redesigning.

# EXISTING ACTION CLASSES
{{ existing_actions_text }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW ACTION CLASSES
- label, definition
- action_category: communication, prevention, maintenance, performance, evaluation, collaboration, creation or monitoring
- volitional_nature: the choice the action reflects
- professional_context
- obligations_fulfilled, causal_implications, temporal_constraints: lists
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - ACTION INDIVIDUALS
Each action actually taken in the case, in timeline order:
- identifier: short unique name, e.g. "Engineer A notifies the city"
- action_class: the class it instantiates
- performed_by, performed_on, temporal_interval
- sequence_order: integer position in the timeline, starting at 1
- causal_triggers, causal_results: lists
- obligations_fulfilled, constraints_respected, capabilities_required: lists
- case_context, text_references, confidence

# CASE TEXT
{{ case_text }}

# OUTPUT
Respond with JSON only:
{
  "new_action_classes": [ ... ],
  "action_individuals": [ ... ]
}`;
