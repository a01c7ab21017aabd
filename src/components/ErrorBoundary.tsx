import React from 'react';
import { errorMessage } from '../lib/errors';

type Props = { children: React.ReactNode };
type State = { hasError: boolean; message?: string };

export default class ErrorBoundary extends React.Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }
  static getDerivedStateFromError(err: unknown): State {
    return { hasError: true, message: errorMessage(err) };
  }
  componentDidCatch(error: Error, info: React.ErrorInfo) {
    console.error('Dashboard render failed:', error, info.componentStack);
  }
  render() {
    if (this.state.hasError) {
      return (
        <div className="container" style={{ paddingTop: 32 }}>
          <div className="card" role="alert">
            <div className="card-header">The ESG dashboard stopped rendering</div>
            <div className="card-body">
              <div style={{ marginBottom: 8 }}>{this.state.message || 'No error message was given.'}</div>
              <div className="muted" style={{ fontSize: 12 }}>
                Reload the page to start again from the sample data.
              </div>
            </div>
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}
