import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  renderWithProviders,
  screen,
  within,
  createMockScenario,
  createMockSummary,
} from '../tests/test-utils';
import { Results } from './Results';
import type { ResultsResponse } from '../types';

const responses = vi.hoisted(() => new Map<string, unknown>());

vi.mock('../api/client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../api/client')>();
  return {
    ...actual,
    api: {
      get: vi.fn(async (endpoint: string) => {
        if (!responses.has(endpoint)) throw new actual.ApiError(404, 'Not Found', `No route ${endpoint}`);
        return responses.get(endpoint);
      }),
      post: vi.fn(),
      delete: vi.fn(),
    },
  };
});

const results: ResultsResponse = {
  summaries: {
    1: createMockSummary({ scenarioId: 1, count: 1, mean: 2, histogram: { 1: 0, 2: 1, 3: 0, 4: 0, 5: 0 } }),
    2: createMockSummary({ scenarioId: 2, count: 2, mean: 4.5, histogram: { 1: 0, 2: 0, 3: 0, 4: 1, 5: 1 } }),
  },
  participation: { voterCount: 2, voters: ['Ana', 'Ben'] },
};

describe('Results', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    responses.clear();
    responses.set('/scenarios', [
      createMockScenario({ id: 1, text: 'AI grades the quiz', submittedBy: 'Ben' }),
      createMockScenario({ id: 2, text: 'AI writes the lab report' }),
    ]);
    responses.set('/results', results);
    responses.set('/settings', { maxScenarioLength: 500, preventDuplicateVotes: true, resetEnabled: false });
  });

  it('ranks scenarios by mean and names the submitter', async () => {
    renderWithProviders(<Results />);
    await screen.findByText('Ranking');

    const [, first, second] = screen.getAllByRole('row');
    expect(first).toHaveTextContent('Scenario 2: AI writes the lab report');
    expect(within(first).getByText('Anonymous')).toBeInTheDocument();
    expect(within(first).getByText('4.50')).toBeInTheDocument();
    expect(second).toHaveTextContent('Scenario 1: AI grades the quiz');
    expect(within(second).getByText('Ben')).toBeInTheDocument();
    expect(within(second).getByText('2.00')).toBeInTheDocument();
  });

  it('shows participation', async () => {
    renderWithProviders(<Results />);

    expect(await screen.findByText('2 voters so far (3 votes in total)')).toBeInTheDocument();
    expect(screen.getByText('Ana, Ben')).toBeInTheDocument();
  });

  it('hides the reset panel when the server has no admin password', async () => {
    renderWithProviders(<Results />);
    await screen.findByText('Ranking');

    expect(screen.queryByText('Instructor: reset all data')).not.toBeInTheDocument();
  });

  it('offers the reset panel when reset is enabled', async () => {
    responses.set('/settings', { maxScenarioLength: 500, preventDuplicateVotes: true, resetEnabled: true });
    renderWithProviders(<Results />);

    expect(await screen.findByText('Instructor: reset all data')).toBeInTheDocument();
  });
});
