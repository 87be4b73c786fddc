import { useQuery } from '@tanstack/react-query';
import { api } from '../api/client';
import type { ResultsResponse } from '../types';

export const resultKeys = {
  all: ['results'] as const,
};

export const RESULTS_REFRESH_MS = 5_000;

export function useResults() {
  return useQuery({
    queryKey: resultKeys.all,
    queryFn: () => api.get<ResultsResponse>('/results'),
    refetchInterval: RESULTS_REFRESH_MS,
  });
}
