/**
 * Incident classification.
 * Maps free text to a short snake_case incident type using ordered keyword rules.
 * The first matching rule wins, so port- and EDI-specific rules come before generic ones.
 */

const INCIDENT_TYPE_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/unexpected qualifier.*['"]\w+['"]\s+in\s+\w+\s+segment/, 'edifact_unexpected_qualifier'],
  [/coarri.*container.*translation|container.*coarri.*error/, 'coarri_container_error'],
  [/edifact.*(?:parse|format|message)/, 'edifact_parsing_error'],
  [/codeco.*(?:error|reject)/, 'codeco_error'],
  [/coprar.*(?:error|reject)/, 'coprar_error'],
  [/baplie.*(?:error|reject)/, 'baplie_error'],
  [/edi.*message.*stuck|edi.*stuck.*error/, 'edi_message_stuck'],
  [/segment.*(?:error|reject|invalid|missing)/, 'edi_segment_error'],
  [/time ?zone drift/, 'timezone_drift'],
  [/dlq.*spike|spike.*dlq|dlq messages/, 'dlq_spike'],
  [/vessel_err|vessel error/, 'vessel_err'],
  [/duplicate.*container|container.*duplication/, 'container_duplication'],
  [/cntr.*(?:duplicate|error)/, 'container_reference_error'],
  [/booking.*(?:duplicate|conflict)/, 'booking_conflict'],
  [/timeout/, 'timeout'],
  [/deadlock/, 'deadlock'],
  [/connection refused/, 'connection_refused'],
  [/invalid format/, 'invalid_format'],
  [/missing field/, 'missing_field'],
  [/auth.*fail/, 'auth_failed'],
  [/permission denied/, 'permission_denied'],
  [/file not found/, 'file_not_found'],
  [/memory leak/, 'memory_leak'],
  [/high cpu/, 'high_cpu'],
  [/disk full/, 'disk_full'],
  [/network unreachable/, 'network_unreachable'],
  [/service unavailable/, 'service_unavailable'],
  [/unknown error/, 'unknown_error'],
];

export const UNKNOWN_INCIDENT_TYPE = 'unknown_error';

export function classifyIncident(text: string): string {
  const lower = text.toLowerCase();

  for (const [pattern, type] of INCIDENT_TYPE_RULES) {
    if (pattern.test(lower)) return type;
  }

  const words = lower.match(/\w+/g) ?? [];
  return words.length > 0 ? words.slice(0, 2).join('_') : UNKNOWN_INCIDENT_TYPE;
}

/** Incident-type prefixes mapped to the word their knowledge categories share. */
const CATEGORY_FAMILIES: ReadonlyArray<readonly [RegExp, string]> = [
  [/^(?:edi|edifact|coarri|codeco|coprar|baplie)_/, 'edi'],
  [/^container_/, 'container'],
  [/^booking_/, 'booking'],
  [/^vessel_/, 'vessel'],
];

/**
 * Category word for knowledge lookups that find nothing by text, e.g.
 * `container_duplication` → `container`. Undefined for types outside a family.
 */
export function categoryHint(incidentType: string): string | undefined {
  return CATEGORY_FAMILIES.find(([pattern]) => pattern.test(incidentType))?.[1];
}
