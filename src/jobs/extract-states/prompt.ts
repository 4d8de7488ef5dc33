/**
 * States Extraction Prompt
 */

export const STATES_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the situational STATES that shape what the professionals involved ought to do: conflicts of interest, risks, emergencies, gaps in competence or information, regulatory situations.

# EXISTING STATE CLASSES
{{ existing_states_text }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW STATE CLASSES
Report kinds of state not already covered above. For each class give:
- label, definition
- state_category: one of conflict, risk, competence, relationship, information, emergency, regulatory, temporal, resource
- persistence_type: inertial (persists until ended) or non_inertial (holds only while its cause holds)
- activation_conditions, termination_conditions: lists of conditions
- obligation_activation: obligations the state brings into force
- action_constraints: actions the state limits
- principle_transformation: how the state shifts the weight of principles
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - STATE INDIVIDUALS
For each concrete occurrence of a state in this case:
- identifier: short unique name, e.g. "Engineer A conflict of interest"
- state_class: the class it instantiates
- subject: who or what is in the state
- active_period, triggering_event, terminated_by
- affected_parties: list
- urgency_level: low, medium, high or critical
- text_references, confidence

# CASE TEXT
{{ case_text }}

# OUTPUT
Respond with JSON only:
{
  "new_state_classes": [ ... ],
  "state_individuals": [ ... ]
}`;
