import { Component, ReactNode, ErrorInfo } from 'react';

interface ErrorBoundaryProps {
  children: ReactNode;
  fallback?: (error: Error, reset: () => void) => ReactNode;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface ErrorBoundaryState {
  error: Error | null;
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('ErrorBoundary caught an error:', error, errorInfo);
    this.props.onError?.(error, errorInfo);
  }

  resetError = () => {
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (error) {
      if (this.props.fallback) {
        return this.props.fallback(error, this.resetError);
      }
      return <DefaultErrorFallback error={error} reset={this.resetError} />;
    }

    return this.props.children;
  }
}

interface ErrorFallbackProps {
  error: Error;
  reset: () => void;
  title?: string;
}

export function DefaultErrorFallback({ error, reset, title = 'Something went wrong' }: ErrorFallbackProps) {
  return (
    <div role="alert" className="flex items-center justify-center min-h-[300px] p-8">
      <div className="card p-8 max-w-md w-full text-center">
        <h2 className="text-xl font-semibold text-surface-900 mb-2">{title}</h2>
        <p className="text-sm text-surface-600 mb-6">{error.message}</p>
        <button type="button" onClick={reset} className="btn-primary">
          Try Again
        </button>
      </div>
    </div>
  );
}
