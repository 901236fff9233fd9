import { useState } from 'react'
import { deleteUpload } from './services/apiService'
import { useUploads } from './hooks/useUploads'
import './UploadsTable.css'

interface UploadsTableProps {
  apiUrl: string;
}

type Notice =
  | { type: 'success'; text: string }
  | { type: 'error'; text: string }

/**
 * UploadsTable Component
 *
 * Listing and deletion flows: shows the images stored under the uploads
 * prefix (key, size in KB, last modified) with a Delete action per row.
 *
 * After a successful delete the listing is marked stale and fetched again,
 * so the removed object disappears without a page reload. A failed delete
 * is reported next to the table and leaves the rest of the page untouched.
 */
function UploadsTable({ apiUrl }: UploadsTableProps) {
  const { data: listing, loading, error, refresh } = useUploads(apiUrl)
  const [notice, setNotice] = useState<Notice | null>(null)
  const [deletingKeys, setDeletingKeys] = useState<Set<string>>(new Set())

  const handleDelete = async (key: string) => {
    setNotice(null)
    setDeletingKeys(prev => new Set(prev).add(key))

    try {
      await deleteUpload(apiUrl, key)
      setNotice({ type: 'success', text: `Deleted ${key}` })
      refresh()
    } catch (err) {
      console.error('Error deleting upload:', err)
      const reason = err instanceof Error ? err.message : String(err)
      setNotice({ type: 'error', text: `Failed to delete ${key}: ${reason}` })
    } finally {
      setDeletingKeys(prev => {
        const next = new Set(prev)
        next.delete(key)
        return next
      })
    }
  }

  const noticeElement = notice && (
    <p
      className={notice.type === 'success' ? 'success-message' : 'error-message'}
      role={notice.type === 'success' ? 'status' : 'alert'}
    >
      {notice.text}
    </p>
  )

  if (loading && !listing) {
    return (
      <section className="uploads-section">
        {noticeElement}
        <p className="loading-state">Loading uploads...</p>
      </section>
    )
  }

  if (error || !listing) {
    return (
      <section className="uploads-section">
        {noticeElement}
        <p className="error-message" role="alert">{error ?? 'Failed to load uploads'}</p>
      </section>
    )
  }

  if (listing.objects.length === 0) {
    return (
      <section className="uploads-section">
        {noticeElement}
        <p className="warning-message" role="alert">
          No objects found in S3 bucket under '{listing.prefix}' prefix.
        </p>
      </section>
    )
  }

  return (
    <section className="uploads-section">
      <h2>S3 Stored Images</h2>
      {noticeElement}
      <table className="uploads-table">
        <thead>
          <tr>
            <th>Key</th>
            <th>Size (KB)</th>
            <th>Last Modified</th>
            <th aria-label="Actions"></th>
          </tr>
        </thead>
        <tbody>
          {listing.objects.map(object => {
            const isDeleting = deletingKeys.has(object.key)
            return (
              <tr key={object.key} className={isDeleting ? 'deleting' : undefined}>
                <td className="upload-key">{object.key}</td>
                <td>{object.sizeKb}</td>
                <td>{object.lastModified}</td>
                <td>
                  <button
                    className="delete-button"
                    onClick={() => void handleDelete(object.key)}
                    disabled={isDeleting}
                    aria-label={`Delete ${object.key}`}
                  >
                    {isDeleting ? 'Deleting...' : 'Delete'}
                  </button>
                </td>
              </tr>
            )
          })}
        </tbody>
      </table>
      {listing.truncated && (
        <p className="info-message">
          Only the first page of objects is shown; older uploads are not listed.
        </p>
      )}
    </section>
  )
}

export default UploadsTable
