import { useDetectionExport } from './hooks/useDetectionExport'
import { downloadFile } from './utils/download'
import './ExportPanel.css'

interface ExportPanelProps {
  apiUrl: string;
}

/**
 * ExportPanel Component
 *
 * Export flow: loads every detection record as CSV and offers it through a
 * single download button. An empty table shows a warning instead, and an
 * export that fails (e.g. a record with a broken timestamp) is reported here
 * without affecting the other sections.
 */
function ExportPanel({ apiUrl }: ExportPanelProps) {
  const { data: exportFile, loading, error } = useDetectionExport(apiUrl)

  if (loading) {
    return (
      <section className="export-section">
        <p className="loading-state">Loading detection records...</p>
      </section>
    )
  }

  if (error !== null || exportFile === undefined) {
    return (
      <section className="export-section">
        <p className="error-message" role="alert">
          Failed to export detection records: {error ?? 'no response'}
        </p>
      </section>
    )
  }

  if (exportFile === null) {
    return (
      <section className="export-section">
        <p className="warning-message" role="alert">No data found in DynamoDB.</p>
      </section>
    )
  }

  return (
    <section className="export-section">
      <h2>Download Annotated Deepfake Data</h2>
      <button className="download-button" onClick={() => downloadFile(exportFile)}>
        Download CSV from DynamoDB
      </button>
    </section>
  )
}

export default ExportPanel
