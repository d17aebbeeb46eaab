import React from 'react';
import { AlertTriangle } from 'lucide-react';
import { useFlowStore } from '../../stores/flowStore';

interface ErrorBoundaryProps {
  children: React.ReactNode;
}

interface ErrorBoundaryState {
  error: Error | null;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    console.error('ErrorBoundary caught an error:', error, errorInfo);
  }

  handleTryAgain = () => {
    this.setState({ error: null });
  };

  handleBackToScenarios = () => {
    useFlowStore.getState().openSettings();
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;

    return (
      <div role="alert" className="flex min-h-[240px] flex-col items-center justify-center rounded-xl border border-red-900/60 bg-red-950/30 p-6">
        <AlertTriangle className="mb-4 h-12 w-12 text-red-400" />
        <h3 className="mb-2 text-lg font-semibold text-slate-100">Something went wrong</h3>
        <p className="mb-4 text-center text-sm text-slate-400">{error.message}</p>
        <div className="flex flex-wrap gap-2">
          <button
            onClick={this.handleTryAgain}
            className="rounded-md bg-blue-600 px-4 py-2 text-sm font-medium text-white hover:bg-blue-500"
          >
            Try Again
          </button>
          <button
            onClick={this.handleBackToScenarios}
            className="rounded-md border border-slate-600 bg-slate-800 px-4 py-2 text-sm font-medium text-slate-200 hover:bg-slate-700"
          >
            Back to scenarios
          </button>
        </div>
      </div>
    );
  }
}
