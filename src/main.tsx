import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import './App.css'
import App from './App'
import { FATAL_HINT, FATAL_TITLE, fatalMessage } from './fatalError'

function FatalPanel({ detail }: { detail: string }) {
  return (
    <div className="app">
      <div className="failure-panel" role="alert">
        <h3>{FATAL_TITLE}</h3>
        <p>{FATAL_HINT}</p>
        <button className="back-btn" onClick={() => window.location.reload()}>Reload</button>
        <details>
          <summary className="failure-hint">Fault details</summary>
          <pre className="formula">{detail}</pre>
        </details>
      </div>
    </div>
  )
}

class CalculatorErrorBoundary extends Component<{ children: ReactNode }, { detail: string | null }> {
  state: { detail: string | null } = { detail: null }
  static getDerivedStateFromError(error: unknown) { return { detail: fatalMessage(error) } }
  render() {
    return this.state.detail !== null ? <FatalPanel detail={this.state.detail} /> : this.props.children
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Root element #root is missing from index.html')
const root = createRoot(container)

// Faults outside React's render cycle replace the page with the same panel
window.addEventListener('error', e => root.render(<FatalPanel detail={fatalMessage(e.error ?? e.message)} />))
window.addEventListener('unhandledrejection', e => root.render(<FatalPanel detail={fatalMessage(e.reason)} />))

root.render(
  <StrictMode>
    <CalculatorErrorBoundary>
      <App />
    </CalculatorErrorBoundary>
  </StrictMode>,
)
