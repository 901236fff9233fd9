import type { DetectionExportFile } from '../types';

/**
 * Offers an in-memory file to the browser as a download without navigating
 * away from the dashboard.
 *
 * @param file - File content, name and MIME type
 */
export function downloadFile(file: DetectionExportFile): void {
  const blob = new Blob([file.content], { type: file.mimeType });
  const blobUrl = URL.createObjectURL(blob);

  const link = document.createElement('a');
  link.href = blobUrl;
  link.download = file.fileName;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);

  URL.revokeObjectURL(blobUrl);
}
