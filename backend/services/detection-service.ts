import { DetectionConfig } from '../lib/config';
import { RemoteDetectionError } from '../lib/errors';
import { DetectionResult, isDetectionResult } from '../interfaces';

/**
 * Dependencies of the submission flow
 */
export interface DetectionDeps {
  config: DetectionConfig;
  fetch: typeof fetch;
}

/**
 * Submit an image URL to the remote detection endpoint
 *
 * Issues exactly one POST with a JSON body `{"file_url": ...}`. There is no
 * retry and no timeout beyond the runtime's defaults.
 *
 * @param deps Endpoint configuration and HTTP client
 * @param fileUrl Image URL entered by the operator, forwarded as-is
 * @returns Detection result with all fields the endpoint returned
 * @throws RemoteDetectionError if the endpoint is unreachable, answers with a
 *         non-200 status, or answers 200 without `verdict` and `confidence`
 */
export async function submitDetection(
  deps: DetectionDeps,
  fileUrl: string
): Promise<DetectionResult> {
  const endpoint = deps.config.detectionApiUrl;

  let response: Response;
  try {
    response = await deps.fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ file_url: fileUrl }),
    });
  } catch (error) {
    throw new RemoteDetectionError(
      `Detection endpoint unreachable: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      '',
      { cause: error }
    );
  }

  const body = await response.text();
  if (response.status !== 200) {
    throw new RemoteDetectionError(
      `Detection endpoint answered ${response.status}`,
      response.status,
      body
    );
  }

  const result = parseJson(body);
  if (!isDetectionResult(result)) {
    throw new RemoteDetectionError(
      `Unexpected detection response: ${body}`,
      response.status,
      body
    );
  }
  return result;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
