/**
 * Raised when the detection endpoint answers with anything other than a
 * usable HTTP 200 detection result. `body` is the raw response text, shown
 * to the operator unmodified.
 */
export class RemoteDetectionError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(body);
    this.name = 'RemoteDetectionError';
  }
}
