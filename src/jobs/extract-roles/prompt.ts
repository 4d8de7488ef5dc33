/**
 * Roles Extraction Prompt
 *
 * Template variables:
 * - {{ existing_roles_text }}
 * - {{ section_type }}
 * - {{ case_text }}
 */

export const ROLES_PROMPT = `# MISSION
You are analysing a professional ethics case. Identify the professional roles it involves at two levels: role CLASSES (kinds of role) and role INDIVIDUALS (the specific people or organisations who occupy them).

# EXISTING ROLE CLASSES
{{ existing_roles_text }}

# TASK
Read the {{ section_type }} section below.

LEVEL 1 - NEW ROLE CLASSES
Report only roles that the existing classes above do not already cover. For each class give:
- label: short professional role name
- definition: function and scope of the role
- role_category: one of provider_client, professional_peer, employer_relationship, public_responsibility, participant, stakeholder
- distinguishing_features: what sets it apart from related roles
- professional_scope: areas of responsibility and authority
- obligations_generated: duties the role creates
- text_references: direct quotes from the case
- confidence: 0.0 to 1.0
- match_decision: {"matches_existing": bool, "matched_label": string or null, "confidence": 0.0 to 1.0, "reasoning": string}

LEVEL 2 - ROLE INDIVIDUALS
For each person or organisation acting in a role:
- identifier: the name exactly as written in the case (e.g. "Engineer A", "Client B")
- role_class: the role class they occupy (an existing label or a new class label)
- role_category: as above
- attributes: qualifications, licences, experience stated in the text
- relationships: list of {"type": ..., "target": ...} (employs, reports_to, serves_client, ...)
- case_involvement: how they take part in the case
- text_references: direct quotes
- confidence: 0.0 to 1.0

Use only names and facts present in the text. Do not invent people or credentials.

# CASE TEXT
{{ case_text }}

# OUTPUT
Respond with JSON only:
{
  "new_role_classes": [ ... ],
  "role_individuals": [ ... ]
}`;
