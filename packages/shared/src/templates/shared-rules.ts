/**
 * Output rules shared by every pass prompt.
 */

export const FIELD_OUTPUT_RULES = `OUTPUT FORMAT:
Return a JSON object {"fields": [...], "warnings": [...]}. Each field has:
- name: snake_case field name (e.g. base_rent, commencement_date, landlord_name)
- value: the value as written, normalised (dates YYYY-MM-DD, currency as plain numbers like 12500.00)
- excerpt: the shortest verbatim quote from the SEGMENT TEXT that supports the value
- confidence: 0 to 1
- category: one of financial, parties, premises, term, use, maintenance, assignment, insurance, default, signature, unclassified

RULES:
- Only report what the SEGMENT TEXT supports. Never invent values.
- Text inside [CONTEXT: ...] belongs to the previous segment. Use it to understand the segment, do not extract from it.
- If nothing relevant is present return an empty fields array.
- Put ambiguities (e.g. two different rent figures) in warnings.`;
