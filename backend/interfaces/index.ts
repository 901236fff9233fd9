export { isDetectionResult } from './DetectionResult'
export type { DetectionResult } from './DetectionResult'
export type { StoredObject, UploadListing } from './StoredObject'
export type { DetectionRecord, DetectionExport } from './DetectionRecord'
