import { describe, it, expect } from 'vitest';
import { ResultsChart, HistogramBars } from './ResultsChart';
import { buildResultsView } from '../utils/results-view';
import { render, screen, within, createMockScenario, createMockSummary } from '../tests/test-utils';

const view = buildResultsView(
  [createMockScenario({ id: 1 }), createMockScenario({ id: 2 })],
  {
    1: createMockSummary({ scenarioId: 1, count: 2, mean: 2.5, histogram: { 1: 0, 2: 1, 3: 1, 4: 0, 5: 0 } }),
    2: createMockSummary({ scenarioId: 2, count: 1, mean: 5, histogram: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 1 } }),
  },
  { voterCount: 2, voters: [] }
);

describe('ResultsChart', () => {
  it('should render one bar per ranked scenario in order', () => {
    render(<ResultsChart rows={view.ranked} />);

    const items = within(screen.getByRole('list', { name: 'Average rating per scenario' })).getAllByRole('listitem');
    expect(items).toHaveLength(2);
    expect(items[0]).toHaveTextContent('Scenario 2');
    expect(items[0]).toHaveTextContent('5.00');
    expect(items[1]).toHaveTextContent('Scenario 1');
    expect(items[1]).toHaveTextContent('2.50');
  });

  it('should size bars by mean', () => {
    render(<ResultsChart rows={view.ranked} />);

    expect(screen.getByTestId('mean-bar-2')).toHaveStyle({ width: '100%' });
    expect(screen.getByTestId('mean-bar-1')).toHaveStyle({ width: '50%' });
  });

  it('should show a message when nothing has been voted on', () => {
    render(<ResultsChart rows={[]} />);

    expect(screen.getByText('No votes have been cast yet.')).toBeInTheDocument();
  });
});

describe('HistogramBars', () => {
  it('should list every score with its count', () => {
    render(<HistogramBars row={view.rows[1]} />);

    expect(screen.getByText('2 - Somewhat Unacceptable')).toBeInTheDocument();
    expect(screen.getAllByText('1')).toHaveLength(2);
    expect(screen.getAllByText('0')).toHaveLength(3);
  });
});
