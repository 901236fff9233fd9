/**
 * API Service Module
 *
 * All calls to the dashboard's HTTP API live here, so components stay free
 * of network details and tests can swap `fetch` for a mock.
 */

import type { DetectionExportFile, DetectionResult, UploadListing } from '../types';
import { RemoteDetectionError } from './errors';

export const EXPORT_FILE_NAME = 'deepfake_detections.csv';
export const EXPORT_MIME_TYPE = 'text/csv';

/**
 * Submits an image URL for detection
 *
 * @param apiUrl - The base URL of the API Gateway endpoint
 * @param fileUrl - Image URL entered by the operator; sent as-is
 * @returns Promise resolving to the detection result with all returned fields
 * @throws RemoteDetectionError carrying the raw response body when the
 *         status is not 200 or the body is not a detection result
 */
export async function submitDetection(apiUrl: string, fileUrl: string): Promise<DetectionResult> {
  const response = await fetch(`${apiUrl}/detections`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({ file_url: fileUrl }),
  });

  const body = await response.text();
  if (response.status !== 200) {
    throw new RemoteDetectionError(response.status, body);
  }

  const data = parseJson(body);
  if (!isDetectionResult(data)) {
    throw new RemoteDetectionError(response.status, body);
  }
  return data;
}

/**
 * Fetches the images stored under the uploads prefix
 *
 * @param apiUrl - The base URL of the API Gateway endpoint
 * @returns Promise resolving to the listing of the first page of objects
 * @throws Error if the API request fails
 */
export async function fetchUploads(apiUrl: string): Promise<UploadListing> {
  const response = await fetch(`${apiUrl}/uploads`);

  if (!response.ok) {
    throw new Error(`Failed to fetch uploads: ${response.status} ${response.statusText}`);
  }

  const data: UploadListing = await response.json();
  return data;
}

/**
 * Deletes one uploaded image by its exact key
 *
 * The key is URL-encoded because S3 keys contain slashes; the backend route
 * takes it through a greedy path parameter and decodes it.
 *
 * @param apiUrl - The base URL of the API Gateway endpoint
 * @param key - Full object key, e.g. `uploads/face.jpg`
 * @throws Error with the backend's explanation if the delete fails
 */
export async function deleteUpload(apiUrl: string, key: string): Promise<void> {
  const encodedKey = encodeURIComponent(key);
  const response = await fetch(`${apiUrl}/uploads/${encodedKey}`, {
    method: 'DELETE',
  });

  if (!response.ok) {
    throw new Error(await readErrorMessage(response));
  }
}

/**
 * Fetches the detection records as a CSV file
 *
 * @param apiUrl - The base URL of the API Gateway endpoint
 * @returns Promise resolving to the file, or null when there are no records
 * @throws Error with the backend's explanation if the export fails
 */
export async function fetchDetectionExport(apiUrl: string): Promise<DetectionExportFile | null> {
  const response = await fetch(`${apiUrl}/detections/export`);

  if (response.status === 204) {
    return null;
  }
  if (!response.ok) {
    throw new Error(await readErrorMessage(response));
  }

  return {
    fileName: EXPORT_FILE_NAME,
    mimeType: EXPORT_MIME_TYPE,
    content: await response.text(),
  };
}

/**
 * Prefer the `message` of a JSON error body, fall back to the status line
 */
async function readErrorMessage(response: Response): Promise<string> {
  const body = parseJson(await response.text());
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return `${response.status} ${response.statusText}`;
}

function isDetectionResult(data: unknown): data is DetectionResult {
  return (
    typeof data === 'object' &&
    data !== null &&
    !Array.isArray(data) &&
    'verdict' in data && typeof data.verdict === 'string' &&
    'confidence' in data && typeof data.confidence === 'number'
  );
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
