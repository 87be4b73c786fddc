import { useQuery, useMutation, useQueryClient } from '@tanstack/react-query';
import { api } from '../api/client';
import { toast } from '../stores/toast';
import type { Scenario } from '../types';

export interface SubmitScenarioInput {
  text: string;
  submittedBy?: string;
}

export const scenarioKeys = {
  all: ['scenarios'] as const,
  list: () => [...scenarioKeys.all, 'list'] as const,
};

// Polling keeps every student's list in step without push updates
export const SCENARIO_REFRESH_MS = 10_000;

export function useScenarios() {
  return useQuery({
    queryKey: scenarioKeys.list(),
    queryFn: () => api.get<Scenario[]>('/scenarios'),
    refetchInterval: SCENARIO_REFRESH_MS,
  });
}

export function useSubmitScenario() {
  const queryClient = useQueryClient();

  return useMutation({
    mutationFn: (input: SubmitScenarioInput) => api.post<Scenario>('/scenarios', input),
    onSuccess: () => {
      void queryClient.invalidateQueries({ queryKey: scenarioKeys.all });
      toast.success('Scenario submitted successfully!');
    },
    onError: (error: Error) => {
      toast.error(error.message || 'Failed to submit scenario');
    },
  });
}
