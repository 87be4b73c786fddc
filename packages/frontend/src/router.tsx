import { lazy, Suspense, type ReactNode } from 'react';
import { createBrowserRouter, Navigate } from 'react-router-dom';
import { Layout } from './components/Layout';
import { ErrorBoundary, LoadingSpinner } from './components/ui';

// Each route becomes its own chunk, loaded on-demand
const SubmitScenario = lazy(() =>
  import('./pages/SubmitScenario').then((m) => ({ default: m.SubmitScenario }))
);

const VoteScenarios = lazy(() =>
  import('./pages/VoteScenarios').then((m) => ({ default: m.VoteScenarios }))
);

const Results = lazy(() => import('./pages/Results').then((m) => ({ default: m.Results })));

function Page({ children }: { children: ReactNode }) {
  return (
    <ErrorBoundary>
      <Suspense fallback={<LoadingSpinner />}>{children}</Suspense>
    </ErrorBoundary>
  );
}

export const router = createBrowserRouter([
  {
    path: '/',
    element: <Layout />,
    children: [
      { index: true, element: <Navigate to="/submit" replace /> },
      { path: 'submit', element: <Page><SubmitScenario /></Page> },
      { path: 'vote', element: <Page><VoteScenarios /></Page> },
      { path: 'results', element: <Page><Results /></Page> },
      { path: '*', element: <Navigate to="/submit" replace /> },
    ],
  },
]);
