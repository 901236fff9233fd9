import './DashboardFooter.css'

/**
 * DashboardFooter Component
 *
 * Names the services the dashboard is built on.
 */
function DashboardFooter() {
  return (
    <footer className="dashboard-footer">
      <hr />
      <p className="footer-caption">
        Built with AWS Lambda, AWS API Gateway, S3, DynamoDB, React and Hugging Face.
      </p>
    </footer>
  )
}

export default DashboardFooter
