import { NavLink, Outlet } from 'react-router-dom';
import { useVoterStore } from '../stores/voter.store';
import { toast } from '../stores/toast';

const tabs = [
  { name: 'Submit Scenario', href: '/submit' },
  { name: 'Vote', href: '/vote' },
  { name: 'Results', href: '/results' },
];

export function Layout() {
  const name = useVoterStore((s) => s.name);
  const setName = useVoterStore((s) => s.setName);
  const startNewSession = useVoterStore((s) => s.startNewSession);

  // Votes are keyed by token, so a new person needs a new token, not just a new name
  const handleNewVoter = () => {
    startNewSession('');
    toast.info('New voter started. Enter your name and vote again.');
  };

  return (
    <div className="min-h-screen bg-surface-50">
      <header className="bg-white border-b border-surface-200">
        <div className="max-w-4xl mx-auto px-6 py-4 flex flex-wrap items-end justify-between gap-4">
          <div>
            <h1 className="text-xl font-semibold text-surface-900">AI Ethics Scenario Voting</h1>
            <p className="text-sm text-surface-500">
              Submit scenarios where AI might be used, then rate how acceptable each one is.
            </p>
          </div>
          <div className="flex items-end gap-2">
            <label className="flex flex-col text-xs font-medium text-surface-600">
              Your name (optional)
              <input
                type="text"
                value={name}
                maxLength={80}
                onChange={(e) => setName(e.target.value)}
                placeholder="Anonymous"
                className="input mt-1 w-48"
              />
            </label>
            <button type="button" className="btn-secondary" onClick={handleNewVoter}>
              Vote as someone new
            </button>
          </div>
        </div>
        <nav aria-label="Main" className="max-w-4xl mx-auto px-6 flex gap-1">
          {tabs.map((tab) => (
            <NavLink
              key={tab.href}
              to={tab.href}
              className={({ isActive }) =>
                `px-4 py-2 text-sm font-medium border-b-2 transition-colors ${
                  isActive
                    ? 'border-accent-600 text-accent-700'
                    : 'border-transparent text-surface-500 hover:text-surface-800'
                }`
              }
            >
              {tab.name}
            </NavLink>
          ))}
        </nav>
      </header>
      <main className="max-w-4xl mx-auto px-6 py-8">
        <Outlet />
      </main>
    </div>
  );
}
