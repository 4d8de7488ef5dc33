/**
 * Events Extraction Prompt
 */

export const EVENTS_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the EVENTS: things that happen without being chosen by the people in the case, such as failures, discoveries, accidents, deadlines passing or regulatory changes.

# EXISTING EVENT CLASSES
{{ existing_events_text }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW EVENT CLASSES
- label, definition
- event_category: crisis, compliance, conflict, project, safety, evaluation, discovery or change
- automatic_nature, ethical_salience
- causal_position: trigger, intermediate or outcome
- constraint_activation, state_transitions: lists
- obligation_transformation
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - EVENT INDIVIDUALS
Each event that occurs in the case, in timeline order:
- identifier: short unique name, e.g. "Retaining wall crack discovered"
- event_class: the class it instantiates
- occurred_to, discovered_by, temporal_interval
- sequence_order: integer position in the timeline, starting at 1
- causal_triggers, causal_results: lists
- constraints_activated, obligations_triggered, states_changed: lists
- case_context, text_references, confidence

# CASE TEXT
{{ case_text }}

# OUTPUT
Respond with JSON only:
{
  "new_event_classes": [ ... ],
  "event_individuals": [ ... ]
}`;
