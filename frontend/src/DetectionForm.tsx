import { useState, type FormEvent } from 'react'
import { submitDetection } from './services/apiService'
import type { DetectionResult } from './types'
import './DetectionForm.css'

interface DetectionFormProps {
  apiUrl: string;
}

/**
 * Renders one value of the detection response as table cell text
 */
const toCellText = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

/**
 * DetectionForm Component
 *
 * Submission flow: the operator enters an image URL, the dashboard asks the
 * detection service for a verdict and shows it, together with every field
 * of the response in a one-row table.
 *
 * The URL is only required to be non-empty; the detection service decides
 * whether it is usable. Non-200 answers are shown with their raw body text.
 */
function DetectionForm({ apiUrl }: DetectionFormProps) {
  const [fileUrl, setFileUrl] = useState('')
  const [isSubmitting, setIsSubmitting] = useState(false)
  const [result, setResult] = useState<DetectionResult | null>(null)
  const [error, setError] = useState<string | null>(null)

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    if (!fileUrl.trim()) return

    setIsSubmitting(true)
    setResult(null)
    setError(null)

    try {
      setResult(await submitDetection(apiUrl, fileUrl))
    } catch (err) {
      console.error('Detection error:', err)
      setError(err instanceof Error ? err.message : 'Detection failed')
    } finally {
      setIsSubmitting(false)
    }
  }

  const columns = result ? Object.keys(result) : []

  return (
    <section className="detection-section">
      <h2>Upload an Image URL for Detection</h2>
      <form className="detection-form" onSubmit={event => void handleSubmit(event)}>
        <label htmlFor="file-url">Enter a publicly accessible image URL:</label>
        <input
          id="file-url"
          type="text"
          value={fileUrl}
          onChange={event => setFileUrl(event.target.value)}
          required
        />
        <button type="submit" disabled={isSubmitting}>
          {isSubmitting ? 'Detecting...' : 'Detect & Store'}
        </button>
      </form>

      {error !== null && (
        <p className="error-message" role="alert">Detection failed: {error}</p>
      )}

      {result && (
        <>
          <p className="success-message" role="status">
            Detected: {result.verdict} (confidence: {result.confidence})
          </p>
          <table className="result-table">
            <thead>
              <tr>
                {columns.map(column => <th key={column}>{column}</th>)}
              </tr>
            </thead>
            <tbody>
              <tr>
                {columns.map(column => <td key={column}>{toCellText(result[column])}</td>)}
              </tr>
            </tbody>
          </table>
        </>
      )}
    </section>
  )
}

export default DetectionForm
