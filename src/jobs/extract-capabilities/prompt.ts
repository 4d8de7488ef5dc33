/**
 * Capabilities Extraction Prompt
 */

export const CAPABILITIES_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the CAPABILITIES the professionals need or show: technical competence, ethical reasoning, communication, awareness of risks and norms.

# EXISTING CAPABILITY CLASSES
{{ existing_capabilities_text }}
{{ cross_concept_context }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW CAPABILITY CLASSES
- label, definition
- capability_category: norm_management, awareness, learning, reasoning, communication, domain_specific or retrieval
- enables_actions, required_for_obligations: lists
- skill_level: basic, intermediate, advanced or expert
- domain_specificity
- text_references: direct quotes
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - CAPABILITY INDIVIDUALS
- identifier: short unique name, e.g. "Engineer A structural analysis"
- capability_class: the class it instantiates
- possessed_by: who has it
- capability_statement: the capability in one sentence
- demonstrated_through: evidence in the case
- proficiency_level: basic, intermediate, advanced or expert
- case_context, text_references, confidence

# CASE TEXT
{{ case_text }}`;
