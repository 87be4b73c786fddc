export { Toaster } from './Toaster';
export { LoadingSpinner } from './LoadingSkeleton';
export { EmptyState, EmptyScenarios } from './EmptyState';
export { ErrorBoundary, DefaultErrorFallback } from './ErrorBoundary';
