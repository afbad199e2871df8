/**
 * Ledgerwise - Error Boundary
 *
 * Keeps a crash inside one view. Saved profile and advisor history live in
 * the store, so leaving or remounting the view loses nothing.
 */

import { Component, type ErrorInfo, type ReactNode } from 'react'
import { AlertTriangle, LayoutDashboard, RotateCcw } from 'lucide-react'
import type { ViewKey } from '../App'
import { createLogger } from '../engine/logger'
import { viewLabel } from './Sidebar'

const log = createLogger('View')

interface Props {
  view: ViewKey
  /** Navigate away from the crashed view; omitted on the dashboard itself */
  onLeave?: () => void
  children: ReactNode
}

interface State {
  error: Error | null
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null }

  static getDerivedStateFromError(error: Error): State {
    return { error }
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    log.error(`${this.props.view} crashed: ${error.message}`, info.componentStack)
  }

  private reset = () => this.setState({ error: null })

  private leave = () => {
    this.reset()
    this.props.onLeave?.()
  }

  render() {
    const { error } = this.state
    if (!error) return this.props.children

    return (
      <div className="empty-state" role="alert" style={{ minHeight: '60vh' }}>
        <div className="empty-state-icon"><AlertTriangle size={28} color="var(--accent-amber)" /></div>
        <div className="empty-state-title">{viewLabel(this.props.view)} stopped working</div>
        <div className="empty-state-description">
          Your saved profile and advisor history are safe. {error.message}
        </div>
        <div style={{ display: 'flex', gap: 10, marginTop: 20 }}>
          <button className="btn btn-primary" onClick={this.reset}>
            <RotateCcw size={14} /> Reload view
          </button>
          {this.props.onLeave && (
            <button className="btn btn-ghost" onClick={this.leave}>
              <LayoutDashboard size={14} /> Dashboard
            </button>
          )}
        </div>
      </div>
    )
  }
}
