/**
 * Finds the patient identifier in extracted PDF text.
 *
 * Matches "Patient ID" or a bare "ID" at the start of a word, an optional
 * ":" or "-" separator, then the digit run:
 *   "Patient ID: 123", "patient id - 123", "ID:123", "PatientID 55"
 */
const PATIENT_ID_PATTERN = /\b(?:Patient\s*ID|ID)\s*[:\-]?\s*(\d+)/i;

export function findPatientId(text: string | null | undefined): string | null {
  if (!text) return null;

  const match = PATIENT_ID_PATTERN.exec(text);
  return match?.[1] ?? null;
}
