import DetectionForm from './DetectionForm'
import UploadsTable from './UploadsTable'
import ExportPanel from './ExportPanel'
import DashboardFooter from './DashboardFooter'
import './App.css'

/**
 * Dashboard page
 *
 * The three sections are independent: each loads its own data and reports
 * its own errors, and none passes data to another.
 */
function App() {
  /**
   * API URL from environment variable or fallback to localhost for development
   */
  const apiUrl = import.meta.env.VITE_API_URL || 'http://localhost:3000'

  return (
    <div className="app-container">
      <header className="app-header">
        <h1>Deepfake Detection Research Dashboard</h1>
        <p className="app-subtitle">
          Upload an image URL, view results, and download training data from DynamoDB.
        </p>
      </header>

      <main className="app-main">
        <DetectionForm apiUrl={apiUrl} />
        <UploadsTable apiUrl={apiUrl} />
        <ExportPanel apiUrl={apiUrl} />
      </main>

      <DashboardFooter />
    </div>
  )
}

export default App
