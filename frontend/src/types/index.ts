/**
 * Shared Type Definitions for Frontend-Backend Integration
 *
 * All API-related types live here so components and services agree on the
 * shape of every dashboard endpoint.
 */

/**
 * Result returned by the detection endpoint
 *
 * Only `verdict` and `confidence` are guaranteed; every other field the
 * service returns is shown in the result table as-is.
 */
export interface DetectionResult {
  verdict: string;
  confidence: number;
  [field: string]: unknown;
}

/**
 * One uploaded image as returned by GET /uploads, already formatted for display
 */
export interface StoredObject {
  key: string;
  sizeKb: number;
  lastModified: string;
}

/**
 * Response of GET /uploads
 */
export interface UploadListing {
  prefix: string;
  objects: StoredObject[];
  /** More objects exist than the single listing page returned */
  truncated: boolean;
}

/**
 * CSV export fetched from GET /detections/export
 */
export interface DetectionExportFile {
  fileName: string;
  mimeType: string;
  content: string;
}
