/**
 * DetectionRecord
 *
 * One item of the detections table. Written by the detection pipeline, read
 * here only for export; apart from `timestamp` (epoch seconds) its attributes
 * are opaque.
 */
export type DetectionRecord = Record<string, unknown>;

/**
 * Result of a successful export: the serialized file and how to offer it
 */
export interface DetectionExport {
  fileName: string;
  contentType: string;
  recordCount: number;
  truncated: boolean;
  csv: string;
}
