/**
 * DetectionResult Interface
 *
 * Body returned by the remote detection endpoint on success. Only `verdict`
 * and `confidence` are guaranteed; any other fields are passed through to the
 * dashboard untouched.
 */
export interface DetectionResult {
  verdict: string;
  confidence: number;
  [field: string]: unknown;
}

/**
 * Type Guard for {@link DetectionResult}
 * @param obj Object to be checked if it conforms to DetectionResult
 * @returns True if obj is DetectionResult, false otherwise
 */
export function isDetectionResult(obj: unknown): obj is DetectionResult {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    !Array.isArray(obj) &&
    ('verdict' in obj && typeof obj.verdict === 'string') &&
    ('confidence' in obj && typeof obj.confidence === 'number')
  );
}
