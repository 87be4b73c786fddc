// Scenario hooks
export {
  useScenarios,
  useSubmitScenario,
  scenarioKeys,
  SCENARIO_REFRESH_MS,
} from './useScenarios';

// Vote hooks
export {
  useMyVotes,
  useCastVote,
  useRetractVote,
  useClearMyVotes,
  voteKeys,
} from './useVotes';

// Results hooks
export { useResults, resultKeys, RESULTS_REFRESH_MS } from './useResults';

// Admin hooks
export { useResetAll } from './useAdmin';

// Settings hooks
export { useSettings, settingsKeys } from './useSettings';
