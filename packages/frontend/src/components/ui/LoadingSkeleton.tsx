export function LoadingSpinner({ label = 'Loading' }: { label?: string }) {
  return (
    <div data-testid="loading" role="status" className="flex items-center justify-center py-12">
      <span className="w-8 h-8 border-4 border-accent-200 border-t-accent-600 rounded-full animate-spin" aria-hidden="true" />
      <span className="sr-only">{label}</span>
    </div>
  );
}
