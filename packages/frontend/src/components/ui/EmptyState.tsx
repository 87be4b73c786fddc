import { ReactNode } from 'react';

export interface EmptyStateProps {
  icon?: ReactNode;
  title: string;
  description?: string;
  action?: {
    label: string;
    onClick: () => void;
  };
  size?: 'sm' | 'md';
}

const sizeClasses = {
  sm: { container: 'py-8', icon: 'w-10 h-10', title: 'text-base' },
  md: { container: 'py-12', icon: 'w-16 h-16', title: 'text-lg' },
};

export function EmptyState({ icon, title, description, action, size = 'md' }: EmptyStateProps) {
  const sizes = sizeClasses[size];

  const defaultIcon = (
    <svg className={`${sizes.icon} text-surface-300`} fill="none" viewBox="0 0 24 24" stroke="currentColor" strokeWidth={1.5} aria-hidden="true">
      <path
        strokeLinecap="round"
        strokeLinejoin="round"
        d="M20.25 7.5l-.625 10.632a2.25 2.25 0 01-2.247 2.118H6.622a2.25 2.25 0 01-2.247-2.118L3.75 7.5M10 11.25h4M3.375 7.5h17.25c.621 0 1.125-.504 1.125-1.125v-1.5c0-.621-.504-1.125-1.125-1.125H3.375c-.621 0-1.125.504-1.125 1.125v1.5c0 .621.504 1.125 1.125 1.125z"
      />
    </svg>
  );

  return (
    <div className={`flex flex-col items-center justify-center text-center ${sizes.container}`}>
      <div className="mb-4 opacity-60">{icon ?? defaultIcon}</div>
      <h3 className={`font-semibold text-surface-900 mb-2 ${sizes.title}`}>{title}</h3>
      {description && <p className="text-surface-500 max-w-md mb-6 text-sm">{description}</p>}
      {action && (
        <button type="button" onClick={action.onClick} className="btn-primary">
          {action.label}
        </button>
      )}
    </div>
  );
}

export function EmptyScenarios({ onSubmit }: { onSubmit?: () => void }) {
  return (
    <EmptyState
      title="No scenarios yet"
      description="Once classmates submit AI-use scenarios they will show up here for voting."
      action={onSubmit ? { label: 'Submit a Scenario', onClick: onSubmit } : undefined}
    />
  );
}
