import { useQuery } from '@tanstack/react-query';
import { api } from '../api/client';
import type { ClientSettings } from '../types';

export const settingsKeys = {
  all: ['settings'] as const,
};

export function useSettings() {
  return useQuery({
    queryKey: settingsKeys.all,
    queryFn: () => api.get<ClientSettings>('/settings'),
    // Server configuration only changes on restart
    staleTime: Infinity,
  });
}
